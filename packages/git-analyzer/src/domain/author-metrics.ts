import type { AuthorMetricsRecord, AuthorQualityMetrics } from "@gitgrade/core";
import type {
  AuthorAggregate,
  AuthorMetricsConfig,
  GlobalAggregate,
  HistoryAggregation,
} from "./history-types.js";
import { comparePaths } from "./history-summary.js";

const SECONDS_PER_DAY = 86_400;

const round1 = (value: number): number => Number(value.toFixed(1));

const sum = (values: Iterable<number>): number => {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
};

/**
 * Files ranked by global change count (ties by path) truncated to the hotspot share.
 * At least `minFiles` are kept when any file changed.
 */
export const selectHotspotFiles = (
  fileChanges: ReadonlyMap<string, number>,
  topPercent: number,
  minFiles: number,
): readonly string[] => {
  if (fileChanges.size === 0) {
    return [];
  }

  const hotspotCount = Math.max(minFiles, Math.floor(fileChanges.size * topPercent));
  return [...fileChanges.entries()]
    .sort((a, b) => b[1] - a[1] || comparePaths(a[0], b[0]))
    .slice(0, hotspotCount)
    .map(([filePath]) => filePath);
};

type ReworkStats = {
  rapidReworkCount: number;
  totalFileModifications: number;
};

const computeRework = (
  fileTimeline: ReadonlyMap<string, readonly number[]>,
  windowDays: number,
): ReworkStats => {
  const windowSeconds = windowDays * SECONDS_PER_DAY;
  let rapidReworkCount = 0;
  let totalFileModifications = 0;

  for (const timestamps of fileTimeline.values()) {
    if (timestamps.length < 2) {
      continue;
    }

    const ordered = [...timestamps].sort((a, b) => a - b);
    for (let i = 1; i < ordered.length; i += 1) {
      const previous = ordered[i - 1] ?? 0;
      const current = ordered[i] ?? previous;
      totalFileModifications += 1;
      if (current - previous <= windowSeconds) {
        rapidReworkCount += 1;
      }
    }
  }

  return { rapidReworkCount, totalFileModifications };
};

const computeFileConcentration = (fileChanges: ReadonlyMap<string, number>, topFiles: number): number => {
  const counts = [...fileChanges.values()].sort((a, b) => b - a);
  const total = sum(counts);
  if (total === 0) {
    return 0;
  }

  return (sum(counts.slice(0, topFiles)) / total) * 100;
};

const computeTotalCodeChanges = (
  author: AuthorAggregate,
  global: GlobalAggregate,
  config: AuthorMetricsConfig,
): number => {
  if (config.codeChangeMode === "exact") {
    return author.insertions + author.deletions;
  }

  if (global.totalCommits === 0) {
    return 0;
  }

  const share = author.commitCount / global.totalCommits;
  return Math.floor(global.totalInsertions * share) + Math.floor(global.totalDeletions * share);
};

const deriveForAuthor = (
  author: AuthorAggregate,
  global: GlobalAggregate,
  hotspots: ReadonlySet<string>,
  config: AuthorMetricsConfig,
  nowUnix: number,
): AuthorQualityMetrics => {
  const commitCount = author.commits.length;
  const timestamps = author.commits.map((commit) => commit.committedAtUnix).sort((a, b) => a - b);
  const firstCommit = timestamps[0] ?? 0;
  const lastCommit = timestamps[timestamps.length - 1] ?? firstCommit;

  const activeDays = Math.max(1, (lastCommit - firstCommit) / SECONDS_PER_DAY);
  const filesModified = author.fileChanges.size;
  let hotspotFiles = 0;
  for (const filePath of author.fileChanges.keys()) {
    if (hotspots.has(filePath)) {
      hotspotFiles += 1;
    }
  }

  const rework = computeRework(author.fileTimeline, config.rapidReworkWindowDays);

  return {
    totalCommits: commitCount,
    filesModified,
    activeDays: round1(activeDays),
    avgFilesPerCommit: round1(sum(author.commits.map((commit) => commit.filesTouched)) / commitCount),
    avgMessageLength: round1(sum(author.commits.map((commit) => commit.messageLength)) / commitCount),
    avgCommitInterval: round1(commitCount > 1 ? activeDays / commitCount : activeDays),
    daysSinceLastCommit: round1((nowUnix - lastCommit) / SECONDS_PER_DAY),
    fileConcentration: round1(computeFileConcentration(author.fileChanges, config.concentrationTopFiles)),
    hotspotParticipation: filesModified === 0 ? 0 : round1((hotspotFiles / filesModified) * 100),
    contributionRatio:
      global.totalCommits === 0 ? 0 : round1((commitCount / global.totalCommits) * 100),
    totalCodeChanges: computeTotalCodeChanges(author, global, config),
    rapidReworkRatio:
      rework.totalFileModifications === 0
        ? 0
        : round1((rework.rapidReworkCount / rework.totalFileModifications) * 100),
    rapidReworkCount: rework.rapidReworkCount,
    totalFileModifications: rework.totalFileModifications,
  };
};

/**
 * Derives per-author quality metrics from an aggregation. `nowUnix` anchors
 * `daysSinceLastCommit`, so results for the same history drift with the run date.
 */
export const deriveAuthorMetrics = (
  aggregation: HistoryAggregation,
  config: AuthorMetricsConfig,
  nowUnix: number,
): readonly AuthorMetricsRecord[] => {
  const hotspots = new Set(
    selectHotspotFiles(aggregation.global.fileChanges, config.hotspotTopPercent, config.hotspotMinFiles),
  );

  const records: AuthorMetricsRecord[] = [];
  for (const author of aggregation.authors.values()) {
    if (author.commits.length === 0) {
      continue;
    }

    records.push({
      author: author.author,
      metrics: deriveForAuthor(author, aggregation.global, hotspots, config, nowUnix),
    });
  }

  return records;
};
