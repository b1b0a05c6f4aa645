import { describe, expect, it } from "vitest";
import type { AnalyzeSummary, AuthorQualityMetrics, AuthorScore } from "@gitgrade/core";
import { createReport, describeGrade, formatReport } from "./index.js";

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

const rankedAuthors: readonly AuthorScore[] = [
  {
    author: "Alice",
    totalScore: 100,
    grade: "S",
    scores: { commitBehavior: 40, qualityAndScope: 30, activity: 30 },
    metrics: metrics({ totalCommits: 8, filesModified: 60, activeDays: 200, contributionRatio: 80, rapidReworkRatio: 5 }),
  },
  {
    author: "Bob|Dev",
    totalScore: 63,
    grade: "C",
    scores: { commitBehavior: 29, qualityAndScope: 16, activity: 18 },
    metrics: metrics({ totalCommits: 2, filesModified: 20, activeDays: 40, contributionRatio: 20, rapidReworkRatio: 25 }),
  },
];

const analysis = (fileCount: number): AnalyzeSummary => ({
  history: {
    targetPath: "/repo",
    range: { from: null, to: null, revision: "HEAD", maxCommits: 1000 },
    analyzedAtUnix: 1_700_000_000,
    codeChangeMode: "prorated",
    summary: {
      totalCommits: 10,
      totalAuthors: 2,
      totalFilesChanged: fileCount,
      totalInsertions: 120,
      totalDeletions: 30,
      authors: ["Alice", "Bob|Dev"],
    },
    topChangedFiles: Array.from({ length: fileCount }, (_, index) => ({
      filePath: `src/file-${String(index).padStart(2, "0")}.ts`,
      changes: fileCount - index,
    })),
    changeDistribution: { low: fileCount, medium: 0, high: 0, veryHigh: 0 },
    hotspotFiles: fileCount > 0 ? ["src/file-00.ts"] : [],
    developerActivity: { months: [], authors: [] },
    authorMetrics: [],
  },
  quality: {
    rankedAuthors,
    gradeDistribution: { S: 1, A: 0, B: 0, C: 1, D: 0 },
    averageScore: 81.5,
  },
});

describe("createReport", () => {
  it("ranks authors with grade descriptions and keeps the ten most-changed files", () => {
    const report = createReport(analysis(12), { generatedAt: "2026-03-01T00:00:00.000Z" });

    expect(report.schemaVersion).toBe("gitgrade.report.v1");
    expect(report.generatedAt).toBe("2026-03-01T00:00:00.000Z");
    expect(report.repository).toEqual({
      targetPath: "/repo",
      revision: "HEAD",
      codeChangeMode: "prorated",
      totalCommits: 10,
      totalAuthors: 2,
      totalFilesChanged: 12,
      totalInsertions: 120,
      totalDeletions: 30,
      averageScore: 81.5,
    });
    expect(report.authors.map((item) => [item.rank, item.author, item.grade])).toEqual([
      [1, "Alice", "S"],
      [2, "Bob|Dev", "C"],
    ]);
    expect(report.authors[1]?.gradeDescription).toBe(describeGrade("C"));
    expect(report.authors[0]?.keyMetrics.filesModified).toBe(60);
    expect(report.topChangedFiles).toHaveLength(10);
    expect(report.topChangedFiles[9]).toEqual({ filePath: "src/file-09.ts", changes: 3 });
  });
});

describe("formatReport", () => {
  const report = createReport(analysis(1), { generatedAt: "2026-03-01T00:00:00.000Z" });

  it("renders a text report", () => {
    expect(formatReport(report, "text").split("\n")).toEqual([
      "Repository Summary",
      "  target: /repo",
      "  revision: HEAD",
      "  commits: 10",
      "  authors: 2",
      "  filesChanged: 1",
      "  insertions: 120",
      "  deletions: 30",
      "  codeChanges: prorated",
      "  averageScore: 81.5",
      "",
      "Author Ranking",
      "  1. Alice | grade=S | total=100",
      "     scores: commitBehavior=40 qualityAndScope=30 activity=30",
      "     commits=8 files=60 activeDays=200 rework=5% contribution=80%",
      "     Outstanding: excellent code quality and working habits",
      "  2. Bob|Dev | grade=C | total=63",
      "     scores: commitBehavior=29 qualityAndScope=16 activity=18",
      "     commits=2 files=20 activeDays=40 rework=25% contribution=20%",
      "     Fair: commit habits and conventions need strengthening",
      "",
      "Grade Distribution",
      "  S=1 A=0 B=0 C=1 D=0",
      "",
      "Change Frequency",
      "  low (1-5): 1",
      "  medium (6-15): 0",
      "  high (16-30): 0",
      "  veryHigh (>30): 0",
      "",
      "Top Changed Files",
      "  - src/file-00.ts | changes=1",
      "  hotspots: src/file-00.ts",
    ]);
  });

  it("renders a markdown ranking table with escaped cells", () => {
    const lines = formatReport(report, "md").split("\n");

    expect(lines[0]).toBe("# gitgrade Report");
    expect(lines).toContain("| 1 | Alice | S | 100 | 40 | 30 | 30 |");
    expect(lines).toContain("| 2 | Bob\\|Dev | C | 63 | 29 | 16 | 18 |");
    expect(lines).toContain("- `src/file-00.ts`: 1");
  });

  it("renders placeholders when nothing was analyzed", () => {
    const empty = createReport(
      {
        ...analysis(0),
        quality: { rankedAuthors: [], gradeDistribution: { S: 0, A: 0, B: 0, C: 0, D: 0 }, averageScore: 0 },
      },
      { generatedAt: "2026-03-01T00:00:00.000Z" },
    );
    const lines = formatReport(empty, "text").split("\n");

    expect(lines.slice(11, 13)).toEqual(["Author Ranking", "  none"]);
    expect(lines.slice(-3)).toEqual(["Top Changed Files", "  none", "  hotspots: none"]);
  });

  it("serializes the report as indented JSON", () => {
    const json = formatReport(report, "json");

    expect(json).toContain('"schemaVersion": "gitgrade.report.v1"');
    expect(JSON.parse(json)).toEqual(report);
  });
});
