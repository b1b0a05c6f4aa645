import { Command, InvalidArgumentError, Option } from "commander";
import type { CodeChangeMode } from "@gitgrade/core";
import type { ExclusionMatchMode } from "@gitgrade/git-analyzer";
import { LOG_LEVELS, parseLogLevel, type LogLevel } from "./logger.js";
import type { HistoryCliOptions } from "./run-analyze-command.js";

export const DEFAULT_MAX_COMMITS = 1000;

const EXCLUSION_MATCH_MODES: readonly ExclusionMatchMode[] = ["basename", "substring", "suffix"];

/** Option values as commander hands them to an action. */
export type RawHistoryOptions = {
  from?: string;
  to?: string;
  maxCommits: string;
  exclude: string[];
  excludeMatch: ExclusionMatchMode[];
  author?: string[];
  codeChanges: CodeChangeMode;
  logLevel: LogLevel;
};

export const parseCount = (value: string, fallback: number): number => {
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

// Repeatable single-value options; variadic ones would consume the [path] argument.
const collect = (value: string, previous: string[]): string[] => [...previous, value];

const collectExclusionMode = (value: string, previous: ExclusionMatchMode[]): ExclusionMatchMode[] => {
  const mode = EXCLUSION_MATCH_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new InvalidArgumentError(`Allowed choices are ${EXCLUSION_MATCH_MODES.join(", ")}.`);
  }
  return [...previous, mode];
};

export const logLevelOption = (): Option =>
  new Option(
    "--log-level <level>",
    "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
  )
    .choices(LOG_LEVELS)
    .default(parseLogLevel(process.env["GITGRADE_LOG_LEVEL"]));

export const addHistoryOptions = (command: Command): Command =>
  command
    .argument("[path]", "path to the git repository to analyze")
    .option("--from <revision>", "older end of the commit range (excluded from the range)")
    .option("--to <revision>", "newer end of the commit range (default: HEAD)")
    .option("--max-commits <count>", "maximum number of commits to analyze", "1000")
    .addOption(
      new Option("--exclude <token>", "changed path to leave out of file tallies (repeatable)")
        .argParser(collect)
        .default([]),
    )
    .addOption(
      new Option(
        "--exclude-match <mode>",
        "how exclusion tokens match paths: basename, substring, suffix (repeatable)",
      )
        .argParser(collectExclusionMode)
        .default([], "basename"),
    )
    .addOption(
      new Option("--author <name>", "only analyze commits by this author, case-insensitive (repeatable)")
        .argParser(collect)
        .default([]),
    )
    .addOption(
      new Option(
        "--code-changes <mode>",
        "per-author code changes: prorated (share of repository totals) or exact",
      )
        .choices(["prorated", "exact"])
        .default("prorated"),
    )
    .addOption(logLevelOption());

export const toHistoryCliOptions = (raw: RawHistoryOptions): HistoryCliOptions => ({
  ...(raw.from === undefined ? {} : { from: raw.from }),
  ...(raw.to === undefined ? {} : { to: raw.to }),
  maxCommits: parseCount(raw.maxCommits, DEFAULT_MAX_COMMITS),
  exclude: raw.exclude,
  excludeMatch: raw.excludeMatch.length > 0 ? raw.excludeMatch : ["basename"],
  authors: raw.author ?? [],
  codeChanges: raw.codeChanges,
});
