import type { ProgressSink, RepositoryHistorySummary } from "@gitgrade/core";
import {
  analyzeRepositoryHistory,
  type AnalyzeRepositoryHistoryInput,
} from "./application/analyze-repository-history.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";
import { listRecentCommits, type RecentCommit } from "./application/list-recent-commits.js";

export type { AnalyzeRepositoryHistoryInput } from "./application/analyze-repository-history.js";
export type { RecentCommit } from "./application/list-recent-commits.js";
export {
  buildRevisionRange,
  RepositoryAccessError,
  type CommitHistoryQuery,
  type GitHistoryProvider,
  type RepositoryAccessFailure,
} from "./application/git-history-provider.js";
export { GitCommandError } from "./infrastructure/git-command-client.js";
export {
  DEFAULT_HISTORY_ANALYSIS_CONFIG,
  type ExclusionMatchMode,
  type GitCommitRecord,
  type HistoryAnalysisConfig,
} from "./domain/history-types.js";
export { analyzeRepositoryHistory, listRecentCommits };

const createGitHistoryProvider = (): GitCliHistoryProvider =>
  new GitCliHistoryProvider(new ExecGitCommandClient());

export const analyzeRepositoryHistoryFromGit = (
  input: AnalyzeRepositoryHistoryInput,
  progressSink?: ProgressSink,
): RepositoryHistorySummary => analyzeRepositoryHistory(input, createGitHistoryProvider(), progressSink);

export const listRecentCommitsFromGit = (repositoryPath: string, limit: number): readonly RecentCommit[] =>
  listRecentCommits(repositoryPath, limit, createGitHistoryProvider());
