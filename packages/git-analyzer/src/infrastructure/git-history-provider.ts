import { existsSync } from "node:fs";
import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import type { GitCommitRecord } from "../domain/history-types.js";
import {
  mapParseProgressToHistoryProgress,
  type CommitHistoryQuery,
  type GitHistoryProvider,
  type GitHistoryProgressEvent,
} from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { parseGitLog } from "../parsing/git-log-parser.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];
const EMPTY_HISTORY_CODES = ["does not have any commits yet"];

const messageMatches = (error: GitCommandError, codes: readonly string[]): boolean => {
  const lower = error.message.toLowerCase();
  return codes.some((code) => lower.includes(code));
};

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  pathExists(repositoryPath: string): boolean {
    return existsSync(repositoryPath);
  }

  isGitRepository(repositoryPath: string): boolean {
    try {
      const output = this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && messageMatches(error, NON_GIT_CODES)) {
        return false;
      }

      throw error;
    }
  }

  getCommitHistory(
    repositoryPath: string,
    query: CommitHistoryQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly GitCommitRecord[] {
    let output: string;
    try {
      output = this.gitClient.run(repositoryPath, [
        "-c",
        "core.quotepath=false",
        "log",
        query.revision,
        `--max-count=${query.maxCommits}`,
        `--pretty=format:${GIT_LOG_FORMAT}`,
        "--numstat",
        "--find-renames",
        // merges are measured against their first parent only
        "--diff-merges=first-parent",
        "--",
      ]);
    } catch (error) {
      if (error instanceof GitCommandError && messageMatches(error, EMPTY_HISTORY_CODES)) {
        onProgress?.({ stage: "git_log_parsed", commits: 0 });
        return [];
      }

      throw error;
    }

    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const commits = parseGitLog(output, (event) => onProgress?.(mapParseProgressToHistoryProgress(event)));
    onProgress?.({ stage: "git_log_parsed", commits: commits.length });
    return commits;
  }
}
