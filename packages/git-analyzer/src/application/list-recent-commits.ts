import type { GitCommitRecord } from "../domain/history-types.js";
import { assertRepositoryAccessible, type GitHistoryProvider } from "./git-history-provider.js";

export type RecentCommit = {
  shortHash: string;
  author: string;
  committedAtUnix: number;
  timezoneOffsetMinutes: number;
  subject: string;
};

const toRecentCommit = (commit: GitCommitRecord): RecentCommit => ({
  shortHash: commit.shortHash,
  author: commit.authorName,
  committedAtUnix: commit.committedAtUnix,
  timezoneOffsetMinutes: commit.timezoneOffsetMinutes,
  subject: commit.message.trim().split("\n")[0] ?? "",
});

export const listRecentCommits = (
  repositoryPath: string,
  limit: number,
  historyProvider: GitHistoryProvider,
): readonly RecentCommit[] => {
  assertRepositoryAccessible(historyProvider, repositoryPath);

  return historyProvider
    .getCommitHistory(repositoryPath, { revision: "HEAD", maxCommits: Math.max(1, limit) })
    .map(toRecentCommit);
};
