import type {
  AnalyzeSummary,
  ChangeDistribution,
  HistorySummaryMetrics,
  QualityGrade,
  QualitySubScores,
} from "@gitgrade/core";

export type AnalyzeOutputMode = "summary" | "json";

type SummaryShape = {
  targetPath: string;
  revision: string;
  history: Omit<HistorySummaryMetrics, "authors">;
  changeDistribution: ChangeDistribution;
  hotspotsTop: readonly string[];
  topChangedFilesTop: ReadonlyArray<{ filePath: string; changes: number }>;
  quality: {
    averageScore: number;
    gradeDistribution: Readonly<Record<QualityGrade, number>>;
    authors: ReadonlyArray<{
      rank: number;
      author: string;
      grade: QualityGrade;
      totalScore: number;
      scores: QualitySubScores;
    }>;
  };
};

const createSummaryShape = (summary: AnalyzeSummary): SummaryShape => {
  const metrics = summary.history.summary;

  return {
    targetPath: summary.history.targetPath,
    revision: summary.history.range.revision,
    history: {
      totalCommits: metrics.totalCommits,
      totalAuthors: metrics.totalAuthors,
      totalFilesChanged: metrics.totalFilesChanged,
      totalInsertions: metrics.totalInsertions,
      totalDeletions: metrics.totalDeletions,
    },
    changeDistribution: summary.history.changeDistribution,
    hotspotsTop: summary.history.hotspotFiles.slice(0, 5),
    topChangedFilesTop: summary.history.topChangedFiles.slice(0, 5),
    quality: {
      averageScore: summary.quality.averageScore,
      gradeDistribution: summary.quality.gradeDistribution,
      authors: summary.quality.rankedAuthors.map((score, index) => ({
        rank: index + 1,
        author: score.author,
        grade: score.grade,
        totalScore: score.totalScore,
        scores: score.scores,
      })),
    },
  };
};

export const formatAnalyzeOutput = (summary: AnalyzeSummary, mode: AnalyzeOutputMode): string =>
  mode === "json"
    ? JSON.stringify(summary, null, 2)
    : JSON.stringify(createSummaryShape(summary), null, 2);
