import { resolveTargetPath } from "@gitgrade/core";
import { listRecentCommitsFromGit, type RecentCommit } from "@gitgrade/git-analyzer";
import { createSilentLogger, type Logger } from "./logger.js";

export type RecentOutputMode = "text" | "json";

const pad = (value: number): string => String(value).padStart(2, "0");

/** Committer-local `YYYY-MM-DD HH:mm ±hh:mm`. */
export const formatCommitDate = (committedAtUnix: number, offsetMinutes: number): string => {
  const local = new Date((committedAtUnix + offsetMinutes * 60) * 1000);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  const date = `${local.getUTCFullYear()}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}`;
  return `${date} ${time} ${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
};

export const formatRecentCommits = (
  commits: readonly RecentCommit[],
  mode: RecentOutputMode,
): string => {
  if (mode === "json") {
    return JSON.stringify(commits, null, 2);
  }

  if (commits.length === 0) {
    return "no commits";
  }

  return commits
    .map(
      (commit) =>
        `${commit.shortHash}  ${formatCommitDate(commit.committedAtUnix, commit.timezoneOffsetMinutes)}  ${commit.author}  ${commit.subject}`,
    )
    .join("\n");
};

export const runRecentCommand = (
  inputPath: string | undefined,
  limit: number,
  logger: Logger = createSilentLogger(),
): readonly RecentCommit[] => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const { absolutePath } = resolveTargetPath(inputPath, invocationCwd);
  logger.info(`listing ${limit} recent commits: ${absolutePath}`);

  const commits = listRecentCommitsFromGit(absolutePath, limit);
  logger.debug(`listed ${commits.length} commits`);
  return commits;
};
