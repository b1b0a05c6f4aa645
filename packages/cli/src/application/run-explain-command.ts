import type { AnalyzeSummary, AuthorScoreTrace, QualityTrace } from "@gitgrade/core";
import { createSilentLogger, type Logger } from "./logger.js";
import {
  collectHistory,
  scoreHistory,
  type HistoryAnalyzer,
  type HistoryCliOptions,
} from "./run-analyze-command.js";

export type ExplainFormat = "text" | "json" | "md";

export type ExplainCommandOptions = {
  select?: string;
  top: number;
  format: ExplainFormat;
};

export type ExplainResult = {
  summary: AnalyzeSummary;
  trace: QualityTrace;
  selectedAuthors: readonly AuthorScoreTrace[];
};

const normalizeAuthor = (author: string): string => author.trim().toLowerCase();

export const selectAuthors = (
  trace: QualityTrace,
  options: Pick<ExplainCommandOptions, "select" | "top">,
): readonly AuthorScoreTrace[] => {
  if (options.select !== undefined) {
    const wanted = normalizeAuthor(options.select);
    return trace.authors.filter((entry) => normalizeAuthor(entry.author) === wanted);
  }

  return trace.authors.slice(0, Math.max(1, options.top));
};

export const runExplainCommand = (
  inputPath: string | undefined,
  historyOptions: HistoryCliOptions,
  options: ExplainCommandOptions,
  logger: Logger = createSilentLogger(),
  analyze?: HistoryAnalyzer,
): ExplainResult => {
  const { history, progressSink } = collectHistory(inputPath, historyOptions, logger, analyze);
  logger.info("computing explainable quality scores");

  const evaluation = scoreHistory(history, progressSink, { explain: true });
  if (evaluation.trace === undefined) {
    throw new Error("quality trace unavailable");
  }

  const selectedAuthors = selectAuthors(evaluation.trace, options);
  if (options.select !== undefined && selectedAuthors.length === 0) {
    logger.warn(`no analyzed author matches "${options.select}"`);
  }

  return {
    summary: evaluation.analysis,
    trace: evaluation.trace,
    selectedAuthors,
  };
};
