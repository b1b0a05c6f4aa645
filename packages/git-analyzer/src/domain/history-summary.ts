import type { ChangeDistribution, ChangedFile, HistorySummaryMetrics } from "@gitgrade/core";
import type { HistoryAggregation } from "./history-types.js";

/** Code-point order, independent of the runtime locale. */
export const comparePaths = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const selectTopChangedFiles = (
  fileChanges: ReadonlyMap<string, number>,
  limit: number,
): readonly ChangedFile[] =>
  [...fileChanges.entries()]
    .sort((a, b) => b[1] - a[1] || comparePaths(a[0], b[0]))
    .slice(0, Math.max(0, limit))
    .map(([filePath, changes]) => ({ filePath, changes }));

export const computeChangeDistribution = (fileChanges: ReadonlyMap<string, number>): ChangeDistribution => {
  const distribution: ChangeDistribution = { low: 0, medium: 0, high: 0, veryHigh: 0 };

  for (const count of fileChanges.values()) {
    if (count <= 5) {
      distribution.low += 1;
    } else if (count <= 15) {
      distribution.medium += 1;
    } else if (count <= 30) {
      distribution.high += 1;
    } else {
      distribution.veryHigh += 1;
    }
  }

  return distribution;
};

export const summarizeHistory = (aggregation: HistoryAggregation): HistorySummaryMetrics => ({
  totalCommits: aggregation.global.totalCommits,
  totalAuthors: aggregation.authors.size,
  totalFilesChanged: aggregation.global.fileChanges.size,
  totalInsertions: aggregation.global.totalInsertions,
  totalDeletions: aggregation.global.totalDeletions,
  authors: [...aggregation.authors.keys()],
});
