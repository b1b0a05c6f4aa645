import type { AnalysisProgressEvent } from "@gitgrade/core";
import { describe, expect, it } from "vitest";
import { createStderrLogger } from "./logger.js";
import { createProgressReporter } from "./progress-reporter.js";

const event = (stage: AnalysisProgressEvent["stage"], current: number, message: string): AnalysisProgressEvent => ({
  stage,
  current,
  total: 100,
  message,
});

describe("createProgressReporter", () => {
  it("logs stage boundaries at info and throttles aggregation updates", () => {
    const lines: string[] = [];
    const reporter = createProgressReporter(createStderrLogger("info", (line) => lines.push(line)));

    reporter.report(event("checking_repository", 0, "checking repository /repo"));
    reporter.report(event("loading_commit_history", 0, "loading up to 1000 commits from HEAD"));
    reporter.report(event("loading_commit_history", 5, "git log loaded (10 bytes)"));
    reporter.report(event("loading_commit_history", 10, "parsed 60 commits"));
    reporter.report(event("aggregating_history", 35, "analyzing git history (20/60 commits)"));
    reporter.report(event("aggregating_history", 60, "analyzing git history (40/60 commits)"));
    reporter.report(event("aggregating_history", 85, "analyzing git history (60/60 commits)"));
    reporter.report(event("deriving_metrics", 90, "deriving metrics for 2 authors"));

    expect(lines).toEqual([
      "[gitgrade] INFO [0%] loading up to 1000 commits from HEAD",
      "[gitgrade] INFO [10%] parsed 60 commits",
      "[gitgrade] INFO [35%] analyzing git history (20/60 commits)",
      "[gitgrade] INFO [60%] analyzing git history (40/60 commits)",
      "[gitgrade] INFO [85%] analyzing git history (60/60 commits)",
      "[gitgrade] INFO [90%] deriving metrics for 2 authors",
    ]);
  });

  it("keeps intermediate updates at debug", () => {
    const lines: string[] = [];
    const reporter = createProgressReporter(createStderrLogger("debug", (line) => lines.push(line)));

    reporter.report(event("aggregating_history", 40, "first"));
    reporter.report(event("aggregating_history", 50, "second"));

    expect(lines).toEqual(["[gitgrade] INFO [40%] first", "[gitgrade] DEBUG [50%] second"]);
  });
});
