import type { ProgressSink, RepositoryHistorySummary } from "@gitgrade/core";
import { buildActivityTimeline } from "../domain/activity-timeline.js";
import { deriveAuthorMetrics, selectHotspotFiles } from "../domain/author-metrics.js";
import { HistoryAggregator } from "../domain/history-aggregator.js";
import {
  computeChangeDistribution,
  selectTopChangedFiles,
  summarizeHistory,
} from "../domain/history-summary.js";
import {
  DEFAULT_HISTORY_ANALYSIS_CONFIG,
  type HistoryAnalysisConfig,
} from "../domain/history-types.js";
import {
  assertRepositoryAccessible,
  buildRevisionRange,
  type GitHistoryProgressEvent,
  type GitHistoryProvider,
} from "./git-history-provider.js";

export type AnalyzeRepositoryHistoryInput = {
  repositoryPath: string;
  config?: Partial<HistoryAnalysisConfig>;
  now?: () => number;
};

const AGGREGATION_PROGRESS_RANGE = { from: 10, to: 85 } as const;

const createEffectiveConfig = (
  overrides: Partial<HistoryAnalysisConfig> | undefined,
): HistoryAnalysisConfig => {
  const config = { ...DEFAULT_HISTORY_ANALYSIS_CONFIG, ...overrides };
  return {
    ...config,
    maxCommits:
      Number.isInteger(config.maxCommits) && config.maxCommits > 0
        ? config.maxCommits
        : DEFAULT_HISTORY_ANALYSIS_CONFIG.maxCommits,
  };
};

const wallClockUnix = (): number => Date.now() / 1000;

const toHistoryProgress = (
  sink: ProgressSink | undefined,
): ((event: GitHistoryProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "git_log_received":
        sink?.report({
          stage: "loading_commit_history",
          current: 5,
          total: 100,
          message: `git log loaded (${event.bytes} bytes)`,
        });
        break;
      case "git_log_parse_progress":
        sink?.report({
          stage: "loading_commit_history",
          current: 5 + Math.floor((event.parsedRecords / Math.max(1, event.totalRecords)) * 5),
          total: 100,
          message: `parsing git log (${event.parsedRecords}/${event.totalRecords} records)`,
        });
        break;
      case "git_log_parsed":
        sink?.report({
          stage: "loading_commit_history",
          current: 10,
          total: 100,
          message: `parsed ${event.commits} commits`,
        });
        break;
    }
  };
};

/**
 * Mines a repository's history into per-author quality metrics.
 * Throws `RepositoryAccessError` before any traversal when the path is unusable.
 */
export const analyzeRepositoryHistory = (
  input: AnalyzeRepositoryHistoryInput,
  historyProvider: GitHistoryProvider,
  progressSink?: ProgressSink,
): RepositoryHistorySummary => {
  progressSink?.report({
    stage: "checking_repository",
    current: 0,
    total: 100,
    message: `checking repository ${input.repositoryPath}`,
  });
  assertRepositoryAccessible(historyProvider, input.repositoryPath);

  const config = createEffectiveConfig(input.config);
  const revision = buildRevisionRange(config.from, config.to);

  progressSink?.report({
    stage: "loading_commit_history",
    current: 0,
    total: 100,
    message: `loading up to ${config.maxCommits} commits from ${revision}`,
  });
  const commits = historyProvider.getCommitHistory(
    input.repositoryPath,
    { revision, maxCommits: config.maxCommits },
    toHistoryProgress(progressSink),
  );

  const aggregation = new HistoryAggregator(config, progressSink, AGGREGATION_PROGRESS_RANGE).aggregate(commits);

  progressSink?.report({
    stage: "deriving_metrics",
    current: 90,
    total: 100,
    message: `deriving metrics for ${aggregation.authors.size} authors`,
  });
  const nowUnix = (input.now ?? wallClockUnix)();

  return {
    targetPath: input.repositoryPath,
    range: {
      from: config.from,
      to: config.to,
      revision,
      maxCommits: config.maxCommits,
    },
    analyzedAtUnix: Math.floor(nowUnix),
    codeChangeMode: config.codeChangeMode,
    summary: summarizeHistory(aggregation),
    topChangedFiles: selectTopChangedFiles(aggregation.global.fileChanges, config.topChangedFilesLimit),
    changeDistribution: computeChangeDistribution(aggregation.global.fileChanges),
    hotspotFiles: selectHotspotFiles(
      aggregation.global.fileChanges,
      config.hotspotTopPercent,
      config.hotspotMinFiles,
    ),
    developerActivity: buildActivityTimeline(aggregation.authors),
    authorMetrics: deriveAuthorMetrics(aggregation, config, nowUnix),
  };
};
