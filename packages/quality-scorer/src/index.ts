export {
  DEFAULT_QUALITY_SCORER_CONFIG,
  type BandTable,
  type GradeThresholds,
  type QualityScorerConfig,
  type ScoreBand,
} from "./config.js";
export { scoreBand } from "./domain/banded-scoring.js";
export { rankAuthors, scoreAuthor, toGrade } from "./domain/quality-model.js";
export {
  evaluateAuthorQuality,
  scoreAuthors,
  type EvaluateAuthorQualityOptions,
  type ScoreAuthorsInput,
} from "./application/score-authors.js";
