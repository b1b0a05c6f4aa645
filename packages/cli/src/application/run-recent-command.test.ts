import { describe, expect, it } from "vitest";
import { formatCommitDate, formatRecentCommits } from "./run-recent-command.js";

describe("formatCommitDate", () => {
  it("renders the committer's local time and offset", () => {
    expect(formatCommitDate(1_700_000_000, 60)).toBe("2023-11-14 23:13 +01:00");
    expect(formatCommitDate(1_700_000_000, -480)).toBe("2023-11-14 14:13 -08:00");
    expect(formatCommitDate(1_700_000_000, -90)).toBe("2023-11-14 20:43 -01:30");
  });
});

describe("formatRecentCommits", () => {
  const commits = [
    {
      shortHash: "abc1234",
      author: "Alice",
      committedAtUnix: 1_700_000_000,
      timezoneOffsetMinutes: 0,
      subject: "Fix parser",
    },
  ];

  it("prints one line per commit", () => {
    expect(formatRecentCommits(commits, "text")).toBe("abc1234  2023-11-14 22:13 +00:00  Alice  Fix parser");
    expect(formatRecentCommits([], "text")).toBe("no commits");
  });

  it("prints JSON on request", () => {
    expect(JSON.parse(formatRecentCommits(commits, "json"))).toEqual(commits);
  });
});
