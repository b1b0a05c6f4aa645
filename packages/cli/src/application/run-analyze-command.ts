import type {
  AnalyzeSummary,
  AuthorQualityEvaluation,
  CodeChangeMode,
  ProgressSink,
  RepositoryHistorySummary,
} from "@gitgrade/core";
import { resolveTargetPath } from "@gitgrade/core";
import {
  analyzeRepositoryHistoryFromGit,
  type ExclusionMatchMode,
  type HistoryAnalysisConfig,
} from "@gitgrade/git-analyzer";
import { evaluateAuthorQuality, type EvaluateAuthorQualityOptions } from "@gitgrade/quality-scorer";
import { createSilentLogger, type Logger } from "./logger.js";
import { createProgressReporter } from "./progress-reporter.js";

export type HistoryCliOptions = {
  from?: string;
  to?: string;
  maxCommits: number;
  exclude: readonly string[];
  excludeMatch: readonly ExclusionMatchMode[];
  authors: readonly string[];
  codeChanges: CodeChangeMode;
};

export type HistoryAnalyzer = (
  repositoryPath: string,
  config: Partial<HistoryAnalysisConfig>,
  progressSink: ProgressSink,
) => RepositoryHistorySummary;

const analyzeWithGit: HistoryAnalyzer = (repositoryPath, config, progressSink) =>
  analyzeRepositoryHistoryFromGit({ repositoryPath, config }, progressSink);

export const toHistoryConfig = (options: HistoryCliOptions): Partial<HistoryAnalysisConfig> => ({
  from: options.from ?? null,
  to: options.to ?? null,
  maxCommits: options.maxCommits,
  excludeFiles: options.exclude,
  exclusionMatch: options.excludeMatch,
  authors: options.authors,
  codeChangeMode: options.codeChanges,
});

export const collectHistory = (
  inputPath: string | undefined,
  options: HistoryCliOptions,
  logger: Logger = createSilentLogger(),
  analyze: HistoryAnalyzer = analyzeWithGit,
): { history: RepositoryHistorySummary; progressSink: ProgressSink } => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const { absolutePath } = resolveTargetPath(inputPath, invocationCwd);
  logger.info(`analyzing repository: ${absolutePath}`);

  const progressSink = createProgressReporter(logger);
  const history = analyze(absolutePath, toHistoryConfig(options), progressSink);
  logger.debug(
    `history: commits=${history.summary.totalCommits}, authors=${history.summary.totalAuthors}, files=${history.summary.totalFilesChanged}`,
  );

  return { history, progressSink };
};

export const scoreHistory = (
  history: RepositoryHistorySummary,
  progressSink: ProgressSink,
  options: EvaluateAuthorQualityOptions = {},
): AuthorQualityEvaluation & { analysis: AnalyzeSummary } => {
  progressSink.report({
    stage: "scoring_authors",
    current: 95,
    total: 100,
    message: `scoring ${history.authorMetrics.length} authors`,
  });
  const evaluation = evaluateAuthorQuality({ authorMetrics: history.authorMetrics }, options);
  progressSink.report({
    stage: "analysis_completed",
    current: 100,
    total: 100,
    message: `analysis completed (averageScore=${evaluation.summary.averageScore})`,
  });

  return { ...evaluation, analysis: { history, quality: evaluation.summary } };
};

export const runAnalyzeCommand = (
  inputPath: string | undefined,
  options: HistoryCliOptions,
  logger: Logger = createSilentLogger(),
  analyze: HistoryAnalyzer = analyzeWithGit,
): AnalyzeSummary => {
  const { history, progressSink } = collectHistory(inputPath, options, logger, analyze);
  return scoreHistory(history, progressSink).analysis;
};
