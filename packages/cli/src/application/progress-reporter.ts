import type { AnalysisProgressEvent, ProgressSink } from "@gitgrade/core";
import type { Logger } from "./logger.js";

const AGGREGATION_LOG_STEP = 25;

const formatEvent = (event: AnalysisProgressEvent): string =>
  `[${Math.round((event.current / Math.max(1, event.total)) * 100)}%] ${event.message}`;

/**
 * Maps analysis progress onto log lines. Stage boundaries log at info; intermediate
 * loading and aggregation updates log at debug, except for aggregation updates
 * that advance at least 25 points past the last info line.
 */
export const createProgressReporter = (logger: Logger): ProgressSink => {
  let lastAggregationLogged: number | null = null;

  return {
    report: (event) => {
      switch (event.stage) {
        case "checking_repository":
          logger.debug(formatEvent(event));
          break;
        case "loading_commit_history":
          if (event.current === 0 || event.current === 10) {
            logger.info(formatEvent(event));
          } else {
            logger.debug(formatEvent(event));
          }
          break;
        case "aggregating_history":
          if (lastAggregationLogged === null || event.current - lastAggregationLogged >= AGGREGATION_LOG_STEP) {
            lastAggregationLogged = event.current;
            logger.info(formatEvent(event));
          } else {
            logger.debug(formatEvent(event));
          }
          break;
        case "deriving_metrics":
        case "scoring_authors":
        case "analysis_completed":
          logger.info(formatEvent(event));
          break;
      }
    },
  };
};
