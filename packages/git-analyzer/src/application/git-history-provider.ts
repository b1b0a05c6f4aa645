import type { GitCommitRecord } from "../domain/history-types.js";
import type { ParseGitLogProgressEvent } from "../parsing/git-log-parser.js";

export type GitHistoryProgressEvent =
  | { stage: "git_log_received"; bytes: number }
  | { stage: "git_log_parsed"; commits: number }
  | { stage: "git_log_parse_progress"; parsedRecords: number; totalRecords: number };

export type CommitHistoryQuery = {
  revision: string;
  maxCommits: number;
};

export interface GitHistoryProvider {
  pathExists(repositoryPath: string): boolean;
  isGitRepository(repositoryPath: string): boolean;
  getCommitHistory(
    repositoryPath: string,
    query: CommitHistoryQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly GitCommitRecord[];
}

export type RepositoryAccessFailure = "path_not_found" | "not_git_repository";

export class RepositoryAccessError extends Error {
  readonly reason: RepositoryAccessFailure;
  readonly repositoryPath: string;

  constructor(reason: RepositoryAccessFailure, repositoryPath: string) {
    super(
      reason === "path_not_found"
        ? `repository path does not exist: ${repositoryPath}`
        : `path is not a git repository: ${repositoryPath}`,
    );
    this.name = "RepositoryAccessError";
    this.reason = reason;
    this.repositoryPath = repositoryPath;
  }
}

export const assertRepositoryAccessible = (
  historyProvider: GitHistoryProvider,
  repositoryPath: string,
): void => {
  if (!historyProvider.pathExists(repositoryPath)) {
    throw new RepositoryAccessError("path_not_found", repositoryPath);
  }

  if (!historyProvider.isGitRepository(repositoryPath)) {
    throw new RepositoryAccessError("not_git_repository", repositoryPath);
  }
};

const presentOrNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * Revision argument for `git log`: `from..to`, `from..HEAD`, `to`, or `HEAD`.
 * `from` is the older endpoint and is itself excluded from the range.
 */
export const buildRevisionRange = (
  from: string | null | undefined,
  to: string | null | undefined,
): string => {
  const older = presentOrNull(from);
  const newer = presentOrNull(to);

  if (older !== null && newer !== null) {
    return `${older}..${newer}`;
  }

  if (older !== null) {
    return `${older}..HEAD`;
  }

  return newer ?? "HEAD";
};

export const mapParseProgressToHistoryProgress = (
  event: ParseGitLogProgressEvent,
): GitHistoryProgressEvent => ({
  stage: "git_log_parse_progress",
  parsedRecords: event.parsedRecords,
  totalRecords: event.totalRecords,
});
