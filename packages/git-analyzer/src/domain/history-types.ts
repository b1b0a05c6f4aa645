import type { CodeChangeMode } from "@gitgrade/core";

export type GitFileChange = {
  filePath: string;
  additions: number;
  deletions: number;
};

export type GitDiffStat = {
  insertions: number;
  deletions: number;
};

export type GitCommitRecord = {
  hash: string;
  shortHash: string;
  parentHashes: readonly string[];
  authorName: string;
  committedAtUnix: number;
  timezoneOffsetMinutes: number;
  message: string;
  fileChanges: readonly GitFileChange[];
  // null when git reported counts that could not be read
  diffStat: GitDiffStat | null;
};

export type ExclusionMatchMode = "basename" | "substring" | "suffix";

export type HistoryAggregationConfig = {
  excludeFiles: readonly string[];
  exclusionMatch: readonly ExclusionMatchMode[];
  authors: readonly string[];
};

export type AuthorMetricsConfig = {
  hotspotTopPercent: number;
  hotspotMinFiles: number;
  concentrationTopFiles: number;
  rapidReworkWindowDays: number;
  codeChangeMode: CodeChangeMode;
};

export type HistorySummaryConfig = {
  topChangedFilesLimit: number;
};

export type HistoryAnalysisConfig = HistoryAggregationConfig &
  AuthorMetricsConfig &
  HistorySummaryConfig & {
    from: string | null;
    to: string | null;
    maxCommits: number;
  };

export const DEFAULT_HISTORY_ANALYSIS_CONFIG: HistoryAnalysisConfig = {
  from: null,
  to: null,
  maxCommits: 1000,
  excludeFiles: [],
  exclusionMatch: ["basename"],
  authors: [],
  hotspotTopPercent: 0.2,
  hotspotMinFiles: 1,
  concentrationTopFiles: 10,
  rapidReworkWindowDays: 5,
  codeChangeMode: "prorated",
  topChangedFilesLimit: 50,
};

export type CommitDetail = {
  committedAtUnix: number;
  messageLength: number;
  filesTouched: number;
};

export type AuthorAggregate = {
  author: string;
  commitCount: number;
  commits: CommitDetail[];
  monthlyCommits: Map<string, number>;
  fileChanges: Map<string, number>;
  fileTimeline: Map<string, number[]>;
  insertions: number;
  deletions: number;
};

export type GlobalAggregate = {
  fileChanges: Map<string, number>;
  totalCommits: number;
  totalInsertions: number;
  totalDeletions: number;
};

export type HistoryAggregation = {
  global: GlobalAggregate;
  authors: ReadonlyMap<string, AuthorAggregate>;
};
