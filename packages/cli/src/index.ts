import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, Option } from "commander";
import { formatAnalyzeOutput, type AnalyzeOutputMode } from "./application/format-analyze-output.js";
import { formatExplainOutput } from "./application/format-explain-output.js";
import {
  addHistoryOptions,
  logLevelOption,
  parseCount,
  toHistoryCliOptions,
  type RawHistoryOptions,
} from "./application/cli-options.js";
import { reportCommandFailure } from "./application/command-errors.js";
import { createStderrLogger, type LogLevel, type Logger } from "./application/logger.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";
import { runExplainCommand, type ExplainFormat } from "./application/run-explain-command.js";
import {
  formatRecentCommits,
  runRecentCommand,
  type RecentOutputMode,
} from "./application/run-recent-command.js";
import { runReportCommand } from "./application/run-report-command.js";
import type { ReportFormat } from "@gitgrade/reporter";

const readVersion = (): string => {
  const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
};

const runGuarded = async (logLevel: LogLevel, action: (logger: Logger) => Promise<void> | void): Promise<void> => {
  const logger = createStderrLogger(logLevel);
  try {
    await action(logger);
  } catch (error) {
    if (!reportCommandFailure(error, logger)) {
      throw error;
    }
  }
};

const program = new Command();

program
  .name("gitgrade")
  .description("Commit history mining and per-author quality scoring for git repositories")
  .version(readVersion());

addHistoryOptions(program.command("analyze").description("analyze history and rank authors"))
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (full analysis object)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action(
    async (
      path: string | undefined,
      options: RawHistoryOptions & { output: AnalyzeOutputMode; json?: boolean },
    ) => {
      await runGuarded(options.logLevel, (logger) => {
        const summary = runAnalyzeCommand(path, toHistoryCliOptions(options), logger);
        const outputMode: AnalyzeOutputMode = options.json === true ? "json" : options.output;
        process.stdout.write(`${formatAnalyzeOutput(summary, outputMode)}\n`);
      });
    },
  );

addHistoryOptions(program.command("report").description("render an author quality report"))
  .addOption(
    new Option("--format <mode>", "output format: text, md, json").choices(["text", "md", "json"]).default("text"),
  )
  .option("--output-file <path>", "also write the rendered report to this file")
  .action(
    async (
      path: string | undefined,
      options: RawHistoryOptions & { format: ReportFormat; outputFile?: string },
    ) => {
      await runGuarded(options.logLevel, async (logger) => {
        const { rendered } = await runReportCommand(
          path,
          toHistoryCliOptions(options),
          {
            format: options.format,
            ...(options.outputFile === undefined ? {} : { outputPath: options.outputFile }),
          },
          logger,
        );
        process.stdout.write(`${rendered}\n`);
      });
    },
  );

addHistoryOptions(program.command("explain").description("show how each author's score was awarded"))
  .option("--select <name>", "explain a single author (case-insensitive)")
  .option("--top <count>", "number of top-ranked authors to explain when none is selected", "5")
  .addOption(
    new Option("--format <mode>", "output format: text, json, md").choices(["text", "json", "md"]).default("text"),
  )
  .action(
    async (
      path: string | undefined,
      options: RawHistoryOptions & { select?: string; top: string; format: ExplainFormat },
    ) => {
      await runGuarded(options.logLevel, (logger) => {
        const result = runExplainCommand(
          path,
          toHistoryCliOptions(options),
          {
            ...(options.select === undefined ? {} : { select: options.select }),
            top: parseCount(options.top, 5),
            format: options.format,
          },
          logger,
        );
        process.stdout.write(`${formatExplainOutput(result, options.format)}\n`);
      });
    },
  );

program
  .command("recent")
  .description("list the most recent commits")
  .argument("[path]", "path to the git repository")
  .option("--limit <count>", "number of commits to list", "10")
  .addOption(new Option("--output <mode>", "output mode: text or json").choices(["text", "json"]).default("text"))
  .addOption(logLevelOption())
  .action(
    async (
      path: string | undefined,
      options: { limit: string; output: RecentOutputMode; logLevel: LogLevel },
    ) => {
      await runGuarded(options.logLevel, (logger) => {
        const commits = runRecentCommand(path, parseCount(options.limit, 10), logger);
        process.stdout.write(`${formatRecentCommits(commits, options.output)}\n`);
      });
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
