import { GitCommandError, RepositoryAccessError } from "@gitgrade/git-analyzer";
import type { Logger } from "./logger.js";

/**
 * Logs failures a user can act on and marks the process as failed.
 * Returns false for anything else, which the caller rethrows.
 */
export const reportCommandFailure = (error: unknown, logger: Logger): boolean => {
  if (error instanceof RepositoryAccessError) {
    logger.error(error.message);
    process.exitCode = 1;
    return true;
  }

  if (error instanceof GitCommandError) {
    logger.error(`git ${error.args.join(" ")} failed: ${error.message}`);
    process.exitCode = 1;
    return true;
  }

  return false;
};
