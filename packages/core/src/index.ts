import { resolve } from "node:path";

export type TargetPath = {
  inputPath: string | undefined;
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  inputPath,
  absolutePath: resolve(cwd, inputPath ?? "."),
});

export type AnalysisStage =
  | "checking_repository"
  | "loading_commit_history"
  | "aggregating_history"
  | "deriving_metrics"
  | "scoring_authors"
  | "analysis_completed";

export type AnalysisProgressEvent = {
  stage: AnalysisStage;
  current: number;
  total: number;
  message: string;
};

export interface ProgressSink {
  report(event: AnalysisProgressEvent): void;
}

export type ProgressRange = {
  from: number;
  to: number;
};

export type CommitRangeSelection = {
  from: string | null;
  to: string | null;
  revision: string;
  maxCommits: number;
};

export type ChangedFile = {
  filePath: string;
  changes: number;
};

export type ChangeDistribution = {
  low: number;
  medium: number;
  high: number;
  veryHigh: number;
};

export type AuthorActivitySeries = {
  author: string;
  totalCommits: number;
  timeline: readonly number[];
};

export type DeveloperActivity = {
  months: readonly string[];
  authors: readonly AuthorActivitySeries[];
};

export type HistorySummaryMetrics = {
  totalCommits: number;
  totalAuthors: number;
  totalFilesChanged: number;
  totalInsertions: number;
  totalDeletions: number;
  authors: readonly string[];
};

export type AuthorQualityMetrics = {
  totalCommits: number;
  filesModified: number;
  activeDays: number;
  avgFilesPerCommit: number;
  avgMessageLength: number;
  avgCommitInterval: number;
  daysSinceLastCommit: number;
  fileConcentration: number;
  hotspotParticipation: number;
  contributionRatio: number;
  totalCodeChanges: number;
  rapidReworkRatio: number;
  rapidReworkCount: number;
  totalFileModifications: number;
};

export type AuthorMetricsRecord = {
  author: string;
  metrics: AuthorQualityMetrics;
};

export type CodeChangeMode = "prorated" | "exact";

export type RepositoryHistorySummary = {
  targetPath: string;
  range: CommitRangeSelection;
  analyzedAtUnix: number;
  codeChangeMode: CodeChangeMode;
  summary: HistorySummaryMetrics;
  topChangedFiles: readonly ChangedFile[];
  changeDistribution: ChangeDistribution;
  hotspotFiles: readonly string[];
  developerActivity: DeveloperActivity;
  authorMetrics: readonly AuthorMetricsRecord[];
};

export type QualityGrade = "S" | "A" | "B" | "C" | "D";

export type QualityDimension = "commitBehavior" | "qualityAndScope" | "activity";

export type QualitySubScores = Record<QualityDimension, number>;

export type AuthorScore = {
  author: string;
  totalScore: number;
  grade: QualityGrade;
  scores: QualitySubScores;
  metrics: AuthorQualityMetrics;
};

export type AuthorQualitySummary = {
  rankedAuthors: readonly AuthorScore[];
  gradeDistribution: Readonly<Record<QualityGrade, number>>;
  averageScore: number;
};

export type QualityCriterionId =
  | "commitBehavior.avgFilesPerCommit"
  | "commitBehavior.daysSinceLastCommit"
  | "commitBehavior.avgMessageLength"
  | "qualityAndScope.filesModified"
  | "qualityAndScope.totalCodeChanges"
  | "qualityAndScope.rapidReworkRatio"
  | "activity.filesModified"
  | "activity.activeDays"
  | "activity.contributionRatio";

export type CriterionTrace = {
  criterionId: QualityCriterionId;
  dimension: QualityDimension;
  value: number;
  points: number;
  maxPoints: number;
};

export type AuthorScoreTrace = {
  author: string;
  totalScore: number;
  grade: QualityGrade;
  criteria: readonly CriterionTrace[];
};

export type QualityTrace = {
  schemaVersion: "1";
  authors: readonly AuthorScoreTrace[];
};

export type AuthorQualityEvaluation = {
  summary: AuthorQualitySummary;
  trace?: QualityTrace;
};

export type AnalyzeSummary = {
  history: RepositoryHistorySummary;
  quality: AuthorQualitySummary;
};
