import type {
  AuthorQualityMetrics,
  ProgressSink,
  RepositoryHistorySummary,
} from "@gitgrade/core";
import type { HistoryAnalysisConfig } from "@gitgrade/git-analyzer";
import { describe, expect, it } from "vitest";
import { formatAnalyzeOutput } from "./format-analyze-output.js";
import { formatExplainOutput } from "./format-explain-output.js";
import { createStderrLogger } from "./logger.js";
import { runAnalyzeCommand, type HistoryAnalyzer, type HistoryCliOptions } from "./run-analyze-command.js";
import { runExplainCommand } from "./run-explain-command.js";
import { runReportCommand } from "./run-report-command.js";

const metrics = (overrides: Partial<AuthorQualityMetrics>): AuthorQualityMetrics => ({
  totalCommits: 1,
  filesModified: 0,
  activeDays: 1,
  avgFilesPerCommit: 0,
  avgMessageLength: 0,
  avgCommitInterval: 1,
  daysSinceLastCommit: 0,
  fileConcentration: 0,
  hotspotParticipation: 0,
  contributionRatio: 0,
  totalCodeChanges: 0,
  rapidReworkRatio: 0,
  rapidReworkCount: 0,
  totalFileModifications: 0,
  ...overrides,
});

const history: RepositoryHistorySummary = {
  targetPath: "/repo",
  range: { from: null, to: null, revision: "HEAD", maxCommits: 200 },
  analyzedAtUnix: 1_700_000_000,
  codeChangeMode: "prorated",
  summary: {
    totalCommits: 12,
    totalAuthors: 2,
    totalFilesChanged: 3,
    totalInsertions: 400,
    totalDeletions: 50,
    authors: ["Bob", "Alice"],
  },
  topChangedFiles: [{ filePath: "src/a.ts", changes: 9 }],
  changeDistribution: { low: 2, medium: 1, high: 0, veryHigh: 0 },
  hotspotFiles: ["src/a.ts"],
  developerActivity: { months: [], authors: [] },
  authorMetrics: [
    {
      author: "Bob",
      metrics: metrics({
        avgFilesPerCommit: 8,
        daysSinceLastCommit: 45,
        avgMessageLength: 12,
        filesModified: 20,
        totalCodeChanges: 600,
        rapidReworkRatio: 25,
        activeDays: 40,
        contributionRatio: 10,
      }),
    },
    {
      author: "Alice",
      metrics: metrics({
        avgFilesPerCommit: 2,
        daysSinceLastCommit: 10,
        avgMessageLength: 25,
        filesModified: 60,
        totalCodeChanges: 12_000,
        rapidReworkRatio: 5,
        activeDays: 200,
        contributionRatio: 40,
      }),
    },
  ],
};

const historyOptions: HistoryCliOptions = {
  maxCommits: 200,
  exclude: [],
  excludeMatch: ["basename"],
  authors: [],
  codeChanges: "prorated",
};

class StubAnalyzer {
  readonly calls: Array<{ repositoryPath: string; config: Partial<HistoryAnalysisConfig> }> = [];

  readonly analyze: HistoryAnalyzer = (repositoryPath, config, _progressSink: ProgressSink) => {
    this.calls.push({ repositoryPath, config });
    return history;
  };
}

describe("runAnalyzeCommand", () => {
  it("analyzes history, scores authors and reports the final stages", () => {
    const stub = new StubAnalyzer();
    const lines: string[] = [];

    const summary = runAnalyzeCommand(
      "/repo",
      historyOptions,
      createStderrLogger("info", (line) => lines.push(line)),
      stub.analyze,
    );

    expect(stub.calls).toEqual([
      {
        repositoryPath: "/repo",
        config: {
          from: null,
          to: null,
          maxCommits: 200,
          excludeFiles: [],
          exclusionMatch: ["basename"],
          authors: [],
          codeChangeMode: "prorated",
        },
      },
    ]);
    expect(summary.quality.rankedAuthors.map((score) => [score.author, score.totalScore])).toEqual([
      ["Alice", 100],
      ["Bob", 63],
    ]);
    expect(lines).toEqual([
      "[gitgrade] INFO analyzing repository: /repo",
      "[gitgrade] INFO [95%] scoring 2 authors",
      "[gitgrade] INFO [100%] analysis completed (averageScore=81.5)",
    ]);
  });

  it("prints a compact summary shape", () => {
    const summary = runAnalyzeCommand("/repo", historyOptions, undefined, new StubAnalyzer().analyze);

    const shape: unknown = JSON.parse(formatAnalyzeOutput(summary, "summary"));

    expect(shape).toMatchObject({
      targetPath: "/repo",
      revision: "HEAD",
      history: { totalCommits: 12, totalAuthors: 2, totalFilesChanged: 3 },
      hotspotsTop: ["src/a.ts"],
      quality: {
        averageScore: 81.5,
        authors: [
          { rank: 1, author: "Alice", grade: "S", totalScore: 100 },
          { rank: 2, author: "Bob", grade: "C", totalScore: 63 },
        ],
      },
    });
  });
});

describe("runExplainCommand", () => {
  it("explains the selected author criterion by criterion", () => {
    const result = runExplainCommand(
      "/repo",
      historyOptions,
      { select: " bob ", top: 5, format: "text" },
      undefined,
      new StubAnalyzer().analyze,
    );

    expect(formatExplainOutput(result, "text").split("\n")).toEqual([
      "target: /repo",
      "revision: HEAD",
      "authors: 2",
      "selectedAuthors: 1",
      "",
      "author: Bob",
      "  total: 63 (grade C)",
      "  commitBehavior: 29",
      "    - avgFilesPerCommit: value=8 points=15/20",
      "    - daysSinceLastCommit: value=45 points=3/5",
      "    - avgMessageLength: value=12 points=11/15",
      "  qualityAndScope: 16",
      "    - filesModified: value=20 points=5/8",
      "    - totalCodeChanges: value=600 points=2/7",
      "    - rapidReworkRatio: value=25 points=9/15",
      "  activity: 18",
      "    - filesModified: value=20 points=6/10",
      "    - activeDays: value=40 points=6/10",
      "    - contributionRatio: value=10 points=6/10",
      "  biggest gaps: qualityAndScope.rapidReworkRatio (+6), commitBehavior.avgFilesPerCommit (+5), qualityAndScope.totalCodeChanges (+5)",
    ]);
  });

  it("explains the top-ranked authors when none is selected", () => {
    const result = runExplainCommand(
      "/repo",
      historyOptions,
      { top: 1, format: "md" },
      undefined,
      new StubAnalyzer().analyze,
    );
    const lines = formatExplainOutput(result, "md").split("\n");

    expect(result.selectedAuthors.map((entry) => entry.author)).toEqual(["Alice"]);
    expect(lines).toContain("## Alice");
    expect(lines).toContain("- biggest gaps: none");
  });
});

describe("runReportCommand", () => {
  it("renders the report in the requested format", async () => {
    const { report, rendered } = await runReportCommand(
      "/repo",
      historyOptions,
      { format: "md" },
      undefined,
      new StubAnalyzer().analyze,
    );

    expect(report.authors.map((item) => item.author)).toEqual(["Alice", "Bob"]);
    expect(rendered.split("\n")[0]).toBe("# gitgrade Report");
    expect(rendered).toContain("| 2 | Bob | C | 63 | 29 | 16 | 18 |");
  });
});
