import type { DeveloperActivity } from "@gitgrade/core";
import type { AuthorAggregate } from "./history-types.js";

export const buildActivityTimeline = (
  authors: ReadonlyMap<string, AuthorAggregate>,
): DeveloperActivity => {
  const monthSet = new Set<string>();
  for (const author of authors.values()) {
    for (const month of author.monthlyCommits.keys()) {
      monthSet.add(month);
    }
  }

  // "YYYY-MM" sorts chronologically
  const months = [...monthSet].sort();

  return {
    months,
    authors: [...authors.values()]
      .sort((a, b) => b.commitCount - a.commitCount)
      .map((author) => ({
        author: author.author,
        totalCommits: author.commitCount,
        timeline: months.map((month) => author.monthlyCommits.get(month) ?? 0),
      })),
  };
};
