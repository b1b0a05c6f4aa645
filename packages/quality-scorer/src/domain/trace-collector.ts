import type { AuthorScoreTrace, QualityTrace } from "@gitgrade/core";

export interface TraceCollector {
  record(author: AuthorScoreTrace): void;
  build(): QualityTrace | undefined;
}

class NoopTraceCollector implements TraceCollector {
  record(_author: AuthorScoreTrace): void {}

  build(): undefined {
    return undefined;
  }
}

class RecordingTraceCollector implements TraceCollector {
  private readonly authors: AuthorScoreTrace[] = [];

  record(author: AuthorScoreTrace): void {
    this.authors.push(author);
  }

  build(): QualityTrace {
    return {
      schemaVersion: "1",
      // same order as the ranking: stable by total descending
      authors: [...this.authors].sort((a, b) => b.totalScore - a.totalScore),
    };
  }
}

const noopCollectorSingleton = new NoopTraceCollector();

export const createTraceCollector = (enabled: boolean): TraceCollector =>
  enabled ? new RecordingTraceCollector() : noopCollectorSingleton;
