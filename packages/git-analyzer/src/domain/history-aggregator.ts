import type { ProgressRange, ProgressSink } from "@gitgrade/core";
import { createAuthorFilter, createPathExclusionMatcher } from "./commit-filters.js";
import type {
  AuthorAggregate,
  GitCommitRecord,
  GlobalAggregate,
  HistoryAggregation,
  HistoryAggregationConfig,
} from "./history-types.js";

const PROGRESS_EVERY_COMMITS = 20;

export const toMonthKey = (unixSeconds: number, timezoneOffsetMinutes: number): string => {
  const local = new Date((unixSeconds + timezoneOffsetMinutes * 60) * 1000);
  const month = String(local.getUTCMonth() + 1).padStart(2, "0");
  return `${local.getUTCFullYear()}-${month}`;
};

const messageLength = (message: string): number => [...message.trim()].length;

const createAuthorAggregate = (author: string): AuthorAggregate => ({
  author,
  commitCount: 0,
  commits: [],
  monthlyCommits: new Map<string, number>(),
  fileChanges: new Map<string, number>(),
  fileTimeline: new Map<string, number[]>(),
  insertions: 0,
  deletions: 0,
});

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

/**
 * Walks a bounded commit sequence once, building repository-wide file tallies and
 * per-author aggregates. Each call to `aggregate` starts from empty state.
 */
export class HistoryAggregator {
  private readonly isExcluded: (filePath: string) => boolean;
  private readonly isAllowedAuthor: (authorName: string) => boolean;

  constructor(
    config: HistoryAggregationConfig,
    private readonly progressSink?: ProgressSink,
    private readonly progressRange: ProgressRange = { from: 0, to: 100 },
  ) {
    this.isExcluded = createPathExclusionMatcher(config.excludeFiles, config.exclusionMatch);
    this.isAllowedAuthor = createAuthorFilter(config.authors);
  }

  aggregate(commits: readonly GitCommitRecord[]): HistoryAggregation {
    const global: GlobalAggregate = {
      fileChanges: new Map<string, number>(),
      totalCommits: 0,
      totalInsertions: 0,
      totalDeletions: 0,
    };
    const authors = new Map<string, AuthorAggregate>();

    for (let index = 0; index < commits.length; index += 1) {
      const commit = commits[index];
      if (commit !== undefined && this.isAllowedAuthor(commit.authorName)) {
        const author = authors.get(commit.authorName) ?? createAuthorAggregate(commit.authorName);
        authors.set(commit.authorName, author);
        this.recordCommit(commit, author, global);
      }

      this.reportProgress(index + 1, commits.length);
    }

    return { global, authors };
  }

  private recordCommit(commit: GitCommitRecord, author: AuthorAggregate, global: GlobalAggregate): void {
    global.totalCommits += 1;
    author.commitCount += 1;
    increment(author.monthlyCommits, toMonthKey(commit.committedAtUnix, commit.timezoneOffsetMinutes));

    const touchedFiles = new Set<string>();
    // root commits have nothing to diff against
    if (commit.parentHashes.length > 0) {
      for (const fileChange of commit.fileChanges) {
        if (touchedFiles.has(fileChange.filePath) || this.isExcluded(fileChange.filePath)) {
          continue;
        }

        touchedFiles.add(fileChange.filePath);
        increment(global.fileChanges, fileChange.filePath);
        increment(author.fileChanges, fileChange.filePath);

        const timeline = author.fileTimeline.get(fileChange.filePath) ?? [];
        timeline.push(commit.committedAtUnix);
        author.fileTimeline.set(fileChange.filePath, timeline);
      }

      const insertions = commit.diffStat?.insertions ?? 0;
      const deletions = commit.diffStat?.deletions ?? 0;
      global.totalInsertions += insertions;
      global.totalDeletions += deletions;
      author.insertions += insertions;
      author.deletions += deletions;
    }

    author.commits.push({
      committedAtUnix: commit.committedAtUnix,
      messageLength: messageLength(commit.message),
      filesTouched: touchedFiles.size,
    });
  }

  private reportProgress(processed: number, total: number): void {
    if (this.progressSink === undefined) {
      return;
    }

    if (processed % PROGRESS_EVERY_COMMITS !== 0 && processed !== total) {
      return;
    }

    const { from, to } = this.progressRange;
    this.progressSink.report({
      stage: "aggregating_history",
      current: Math.floor(from + (processed / total) * (to - from)),
      total: 100,
      message: `analyzing git history (${processed}/${total} commits)`,
    });
  }
}
