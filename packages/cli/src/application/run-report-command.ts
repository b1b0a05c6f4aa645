import { writeFile } from "node:fs/promises";
import {
  createReport,
  formatReport,
  type GitGradeReport,
  type ReportFormat,
} from "@gitgrade/reporter";
import { createSilentLogger, type Logger } from "./logger.js";
import {
  collectHistory,
  scoreHistory,
  type HistoryAnalyzer,
  type HistoryCliOptions,
} from "./run-analyze-command.js";

export type ReportCommandOptions = {
  format: ReportFormat;
  outputPath?: string;
};

export const runReportCommand = async (
  inputPath: string | undefined,
  historyOptions: HistoryCliOptions,
  options: ReportCommandOptions,
  logger: Logger = createSilentLogger(),
  analyze?: HistoryAnalyzer,
): Promise<{ report: GitGradeReport; rendered: string }> => {
  const { history, progressSink } = collectHistory(inputPath, historyOptions, logger, analyze);
  const { analysis } = scoreHistory(history, progressSink);

  logger.info("building report");
  const report = createReport(analysis);
  const rendered = formatReport(report, options.format);

  if (options.outputPath !== undefined) {
    await writeFile(options.outputPath, rendered, "utf8");
    logger.info(`report written: ${options.outputPath}`);
  }

  return { report, rendered };
};
