import type {
  ChangeDistribution,
  ChangedFile,
  CodeChangeMode,
  QualityGrade,
  QualitySubScores,
} from "@gitgrade/core";

export const REPORT_SCHEMA_VERSION = "gitgrade.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "json" | "text" | "md";

export type AuthorKeyMetrics = {
  totalCommits: number;
  filesModified: number;
  activeDays: number;
  avgFilesPerCommit: number;
  avgMessageLength: number;
  daysSinceLastCommit: number;
  rapidReworkRatio: number;
  contributionRatio: number;
  totalCodeChanges: number;
};

export type AuthorReportItem = {
  rank: number;
  author: string;
  grade: QualityGrade;
  gradeDescription: string;
  totalScore: number;
  scores: QualitySubScores;
  keyMetrics: AuthorKeyMetrics;
};

export type GitGradeReport = {
  schemaVersion: ReportSchemaVersion;
  generatedAt: string;
  repository: {
    targetPath: string;
    revision: string;
    codeChangeMode: CodeChangeMode;
    totalCommits: number;
    totalAuthors: number;
    totalFilesChanged: number;
    totalInsertions: number;
    totalDeletions: number;
    averageScore: number;
  };
  authors: readonly AuthorReportItem[];
  gradeDistribution: Readonly<Record<QualityGrade, number>>;
  changeDistribution: ChangeDistribution;
  topChangedFiles: readonly ChangedFile[];
  hotspotFiles: readonly string[];
};

const GRADE_DESCRIPTIONS: Readonly<Record<QualityGrade, string>> = {
  S: "Outstanding: excellent code quality and working habits",
  A: "Excellent: good code quality and steady contributions",
  B: "Good: meets team standards with room to improve",
  C: "Fair: commit habits and conventions need strengthening",
  D: "Needs improvement: guidance and support recommended",
};

export const describeGrade = (grade: QualityGrade): string => GRADE_DESCRIPTIONS[grade];

export const GRADES: readonly QualityGrade[] = ["S", "A", "B", "C", "D"];
