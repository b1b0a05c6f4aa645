import { describe, expect, it } from "vitest";
import type { GitHistoryProgressEvent } from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { GitCliHistoryProvider } from "./git-history-provider.js";

class StubGitCommandClient implements GitCommandClient {
  readonly calls: (readonly string[])[] = [];

  constructor(private readonly respond: (args: readonly string[]) => string) {}

  run(_repositoryPath: string, args: readonly string[]): string {
    this.calls.push(args);
    return this.respond(args);
  }
}

const failWith =
  (stderr: string) =>
  (args: readonly string[]): string => {
    throw new GitCommandError(stderr, args, stderr);
  };

const rawLog = [
  `\u001e${["abc1234567", "abc1234", "def4567890", "Alice", "1700000000", "2023-11-14T22:13:20Z", "Fix parser\u001d"].join("\u001f")}`,
  "",
  "3\t1\tsrc/a.ts",
].join("\n");

describe("GitCliHistoryProvider", () => {
  it("recognizes a work tree", () => {
    const client = new StubGitCommandClient(() => "true\n");

    expect(new GitCliHistoryProvider(client).isGitRepository("/repo")).toBe(true);
    expect(client.calls).toEqual([["rev-parse", "--is-inside-work-tree"]]);
  });

  it("treats git's not-a-repository failure as a plain directory", () => {
    const client = new StubGitCommandClient(
      failWith("fatal: not a git repository (or any of the parent directories): .git"),
    );

    expect(new GitCliHistoryProvider(client).isGitRepository("/tmp/plain")).toBe(false);
  });

  it("rethrows unrelated git failures", () => {
    const client = new StubGitCommandClient(failWith("fatal: unable to access repository"));

    expect(() => new GitCliHistoryProvider(client).isGitRepository("/repo")).toThrow(GitCommandError);
  });

  it("reads first-parent history for the requested revision", () => {
    const client = new StubGitCommandClient(() => rawLog);
    const events: GitHistoryProgressEvent[] = [];

    const commits = new GitCliHistoryProvider(client).getCommitHistory(
      "/repo",
      { revision: "v1..HEAD", maxCommits: 25 },
      (event) => events.push(event),
    );

    const [args] = client.calls;
    expect(args?.slice(0, 5)).toEqual(["-c", "core.quotepath=false", "log", "v1..HEAD", "--max-count=25"]);
    expect(args).toContain("--diff-merges=first-parent");
    expect(args).toContain("--numstat");
    expect(commits.map((commit) => commit.hash)).toEqual(["abc1234567"]);
    expect(events.map((event) => event.stage)).toEqual([
      "git_log_received",
      "git_log_parse_progress",
      "git_log_parsed",
    ]);
  });

  it("returns no commits for a repository without any", () => {
    const client = new StubGitCommandClient(
      failWith("fatal: your current branch 'main' does not have any commits yet"),
    );
    const events: GitHistoryProgressEvent[] = [];

    const commits = new GitCliHistoryProvider(client).getCommitHistory(
      "/repo",
      { revision: "HEAD", maxCommits: 10 },
      (event) => events.push(event),
    );

    expect(commits).toEqual([]);
    expect(events).toEqual([{ stage: "git_log_parsed", commits: 0 }]);
  });
});
