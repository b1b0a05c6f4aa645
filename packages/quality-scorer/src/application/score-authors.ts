import type {
  AuthorMetricsRecord,
  AuthorQualityEvaluation,
  AuthorQualitySummary,
  AuthorScore,
  QualityGrade,
} from "@gitgrade/core";
import { DEFAULT_QUALITY_SCORER_CONFIG, type QualityScorerConfig } from "../config.js";
import { average, round1 } from "../domain/math.js";
import { rankAuthors, scoreAuthor } from "../domain/quality-model.js";
import { createTraceCollector } from "../domain/trace-collector.js";

export type ScoreAuthorsInput = {
  authorMetrics: readonly AuthorMetricsRecord[];
  config?: Partial<QualityScorerConfig>;
};

export type EvaluateAuthorQualityOptions = {
  explain?: boolean;
};

const mergeConfig = (overrides: Partial<QualityScorerConfig> | undefined): QualityScorerConfig => {
  if (overrides === undefined) {
    return DEFAULT_QUALITY_SCORER_CONFIG;
  }

  return {
    commitBehavior: {
      ...DEFAULT_QUALITY_SCORER_CONFIG.commitBehavior,
      ...overrides.commitBehavior,
    },
    qualityAndScope: {
      ...DEFAULT_QUALITY_SCORER_CONFIG.qualityAndScope,
      ...overrides.qualityAndScope,
    },
    activity: {
      ...DEFAULT_QUALITY_SCORER_CONFIG.activity,
      ...overrides.activity,
    },
    gradeThresholds: {
      ...DEFAULT_QUALITY_SCORER_CONFIG.gradeThresholds,
      ...overrides.gradeThresholds,
    },
  };
};

const countGrades = (scores: readonly AuthorScore[]): Record<QualityGrade, number> => {
  const distribution: Record<QualityGrade, number> = { S: 0, A: 0, B: 0, C: 0, D: 0 };
  for (const score of scores) {
    distribution[score.grade] += 1;
  }
  return distribution;
};

export const scoreAuthors = (input: ScoreAuthorsInput): AuthorQualitySummary =>
  evaluateAuthorQuality(input, { explain: false }).summary;

export const evaluateAuthorQuality = (
  input: ScoreAuthorsInput,
  options: EvaluateAuthorQualityOptions = {},
): AuthorQualityEvaluation => {
  const config = mergeConfig(input.config);
  const collector = createTraceCollector(options.explain === true);

  const rankedAuthors = rankAuthors(
    input.authorMetrics.map((record) => scoreAuthor(record, config, collector)),
  );
  const summary: AuthorQualitySummary = {
    rankedAuthors,
    gradeDistribution: countGrades(rankedAuthors),
    averageScore: round1(average(rankedAuthors.map((score) => score.totalScore))),
  };

  const trace = collector.build();
  if (trace === undefined) {
    return { summary };
  }

  return { summary, trace };
};
