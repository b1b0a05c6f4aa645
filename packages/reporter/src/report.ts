import type { AnalyzeSummary, AuthorScore } from "@gitgrade/core";
import {
  REPORT_SCHEMA_VERSION,
  describeGrade,
  type AuthorReportItem,
  type GitGradeReport,
} from "./domain.js";

export type CreateReportOptions = {
  generatedAt?: string;
  topFilesLimit?: number;
};

const toAuthorItem = (score: AuthorScore, index: number): AuthorReportItem => ({
  rank: index + 1,
  author: score.author,
  grade: score.grade,
  gradeDescription: describeGrade(score.grade),
  totalScore: score.totalScore,
  scores: score.scores,
  keyMetrics: {
    totalCommits: score.metrics.totalCommits,
    filesModified: score.metrics.filesModified,
    activeDays: score.metrics.activeDays,
    avgFilesPerCommit: score.metrics.avgFilesPerCommit,
    avgMessageLength: score.metrics.avgMessageLength,
    daysSinceLastCommit: score.metrics.daysSinceLastCommit,
    rapidReworkRatio: score.metrics.rapidReworkRatio,
    contributionRatio: score.metrics.contributionRatio,
    totalCodeChanges: score.metrics.totalCodeChanges,
  },
});

export const createReport = (
  analysis: AnalyzeSummary,
  options: CreateReportOptions = {},
): GitGradeReport => {
  const { history, quality } = analysis;

  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    generatedAt: options.generatedAt ?? new Date().toISOString(),
    repository: {
      targetPath: history.targetPath,
      revision: history.range.revision,
      codeChangeMode: history.codeChangeMode,
      totalCommits: history.summary.totalCommits,
      totalAuthors: history.summary.totalAuthors,
      totalFilesChanged: history.summary.totalFilesChanged,
      totalInsertions: history.summary.totalInsertions,
      totalDeletions: history.summary.totalDeletions,
      averageScore: quality.averageScore,
    },
    authors: quality.rankedAuthors.map(toAuthorItem),
    gradeDistribution: quality.gradeDistribution,
    changeDistribution: history.changeDistribution,
    topChangedFiles: history.topChangedFiles.slice(0, options.topFilesLimit ?? 10),
    hotspotFiles: history.hotspotFiles,
  };
};
