import type {
  AuthorMetricsRecord,
  AuthorQualityMetrics,
  AuthorScore,
  CriterionTrace,
  QualityCriterionId,
  QualityDimension,
  QualityGrade,
  QualitySubScores,
} from "@gitgrade/core";
import type { BandTable, GradeThresholds, QualityScorerConfig } from "../config.js";
import { maxBandPoints, scoreBand } from "./banded-scoring.js";
import { clampToCeiling, round1 } from "./math.js";
import type { TraceCollector } from "./trace-collector.js";

type CriterionDefinition = {
  id: QualityCriterionId;
  dimension: QualityDimension;
  table: (config: QualityScorerConfig) => BandTable;
  value: (metrics: AuthorQualityMetrics) => number;
};

const CRITERIA: readonly CriterionDefinition[] = [
  {
    id: "commitBehavior.avgFilesPerCommit",
    dimension: "commitBehavior",
    table: (config) => config.commitBehavior.avgFilesPerCommit,
    value: (metrics) => metrics.avgFilesPerCommit,
  },
  {
    id: "commitBehavior.daysSinceLastCommit",
    dimension: "commitBehavior",
    table: (config) => config.commitBehavior.daysSinceLastCommit,
    value: (metrics) => metrics.daysSinceLastCommit,
  },
  {
    id: "commitBehavior.avgMessageLength",
    dimension: "commitBehavior",
    table: (config) => config.commitBehavior.avgMessageLength,
    value: (metrics) => metrics.avgMessageLength,
  },
  {
    id: "qualityAndScope.filesModified",
    dimension: "qualityAndScope",
    table: (config) => config.qualityAndScope.filesModified,
    value: (metrics) => metrics.filesModified,
  },
  {
    id: "qualityAndScope.totalCodeChanges",
    dimension: "qualityAndScope",
    table: (config) => config.qualityAndScope.totalCodeChanges,
    value: (metrics) => metrics.totalCodeChanges,
  },
  {
    id: "qualityAndScope.rapidReworkRatio",
    dimension: "qualityAndScope",
    table: (config) => config.qualityAndScope.rapidReworkRatio,
    value: (metrics) => metrics.rapidReworkRatio,
  },
  {
    id: "activity.filesModified",
    dimension: "activity",
    table: (config) => config.activity.filesModified,
    value: (metrics) => metrics.filesModified,
  },
  {
    id: "activity.activeDays",
    dimension: "activity",
    table: (config) => config.activity.activeDays,
    value: (metrics) => metrics.activeDays,
  },
  {
    id: "activity.contributionRatio",
    dimension: "activity",
    table: (config) => config.activity.contributionRatio,
    value: (metrics) => metrics.contributionRatio,
  },
];

const GRADE_ORDER = ["S", "A", "B", "C"] as const;

/** Lower bounds are inclusive: 90 is S, 89.9 is A. */
export const toGrade = (totalScore: number, thresholds: GradeThresholds): QualityGrade =>
  GRADE_ORDER.find((grade) => totalScore >= thresholds[grade]) ?? "D";

export const evaluateCriteria = (
  metrics: AuthorQualityMetrics,
  config: QualityScorerConfig,
): readonly CriterionTrace[] =>
  CRITERIA.map((criterion) => {
    const table = criterion.table(config);
    const value = criterion.value(metrics);

    return {
      criterionId: criterion.id,
      dimension: criterion.dimension,
      value,
      points: scoreBand(table, value),
      maxPoints: maxBandPoints(table),
    };
  });

const sumDimension = (criteria: readonly CriterionTrace[], dimension: QualityDimension): number =>
  criteria
    .filter((criterion) => criterion.dimension === dimension)
    .reduce((sum, criterion) => sum + criterion.points, 0);

export const scoreAuthor = (
  record: AuthorMetricsRecord,
  config: QualityScorerConfig,
  collector?: TraceCollector,
): AuthorScore => {
  const criteria = evaluateCriteria(record.metrics, config);

  const scores: QualitySubScores = {
    commitBehavior: round1(
      clampToCeiling(sumDimension(criteria, "commitBehavior"), config.commitBehavior.ceiling),
    ),
    qualityAndScope: round1(
      clampToCeiling(sumDimension(criteria, "qualityAndScope"), config.qualityAndScope.ceiling),
    ),
    activity: round1(clampToCeiling(sumDimension(criteria, "activity"), config.activity.ceiling)),
  };
  const totalScore = round1(scores.commitBehavior + scores.qualityAndScope + scores.activity);
  const grade = toGrade(totalScore, config.gradeThresholds);

  collector?.record({ author: record.author, totalScore, grade, criteria });

  return {
    author: record.author,
    totalScore,
    grade,
    scores,
    metrics: record.metrics,
  };
};

/** Total descending; equal totals keep their input order. */
export const rankAuthors = (scores: readonly AuthorScore[]): readonly AuthorScore[] =>
  [...scores].sort((a, b) => b.totalScore - a.totalScore);
