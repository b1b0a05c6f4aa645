import type { QualityGrade } from "@gitgrade/core";

/** Closed interval `[min, max]`; a missing bound is unbounded on that side. */
export type ScoreBand = {
  min?: number;
  max?: number;
  points: number;
};

export type BandTable = {
  bands: readonly ScoreBand[];
  fallback: number;
};

export type CommitBehaviorTables = {
  ceiling: number;
  avgFilesPerCommit: BandTable;
  daysSinceLastCommit: BandTable;
  avgMessageLength: BandTable;
};

export type QualityAndScopeTables = {
  ceiling: number;
  filesModified: BandTable;
  totalCodeChanges: BandTable;
  rapidReworkRatio: BandTable;
};

export type ActivityTables = {
  ceiling: number;
  filesModified: BandTable;
  activeDays: BandTable;
  contributionRatio: BandTable;
};

export type GradeThresholds = Record<Exclude<QualityGrade, "D">, number>;

export type QualityScorerConfig = {
  commitBehavior: CommitBehaviorTables;
  qualityAndScope: QualityAndScopeTables;
  activity: ActivityTables;
  gradeThresholds: GradeThresholds;
};

export const DEFAULT_QUALITY_SCORER_CONFIG: QualityScorerConfig = {
  commitBehavior: {
    ceiling: 40,
    // Bands are tried in order, so shared edges go to the earlier band.
    avgFilesPerCommit: {
      bands: [
        { min: 1, max: 3, points: 20 },
        { min: 3, max: 6, points: 18 },
        { min: 0.5, max: 1, points: 15 },
        { min: 6, max: 10, points: 15 },
        { min: 10, max: 15, points: 10 },
      ],
      fallback: 5,
    },
    daysSinceLastCommit: {
      bands: [
        { max: 30, points: 5 },
        { max: 90, points: 3 },
      ],
      fallback: 1,
    },
    avgMessageLength: {
      bands: [
        { min: 20, points: 15 },
        { min: 10, points: 11 },
      ],
      fallback: 5,
    },
  },
  qualityAndScope: {
    ceiling: 30,
    filesModified: {
      bands: [
        { min: 50, points: 8 },
        { min: 30, points: 7 },
        { min: 15, points: 5 },
        { min: 5, points: 3 },
      ],
      fallback: 1,
    },
    totalCodeChanges: {
      bands: [
        { min: 10_000, points: 7 },
        { min: 5_000, points: 6 },
        { min: 2_000, points: 4 },
        { min: 500, points: 2 },
      ],
      fallback: 1,
    },
    rapidReworkRatio: {
      bands: [
        { max: 10, points: 15 },
        { max: 20, points: 12 },
        { max: 30, points: 9 },
        { max: 50, points: 5 },
      ],
      fallback: 2,
    },
  },
  activity: {
    ceiling: 30,
    filesModified: {
      bands: [
        { min: 50, points: 10 },
        { min: 30, points: 8 },
        { min: 10, points: 6 },
      ],
      fallback: 3,
    },
    activeDays: {
      bands: [
        { min: 180, points: 10 },
        { min: 90, points: 8 },
        { min: 30, points: 6 },
      ],
      fallback: 3,
    },
    contributionRatio: {
      bands: [
        { min: 30, points: 10 },
        { min: 15, points: 8 },
        { min: 5, points: 6 },
      ],
      fallback: 3,
    },
  },
  gradeThresholds: {
    S: 90,
    A: 80,
    B: 70,
    C: 60,
  },
};
