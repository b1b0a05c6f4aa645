import type { ExclusionMatchMode } from "./history-types.js";

const normalizeSeparators = (path: string): string => path.replaceAll("\\", "/");

const basenameOf = (path: string): string => {
  const index = path.lastIndexOf("/");
  return index < 0 ? path : path.slice(index + 1);
};

/**
 * Builds a predicate telling whether a changed path is excluded from file tallies.
 * Tokens are trimmed and compared case-sensitively against the slash-normalized path
 * using every enabled match mode.
 */
export const createPathExclusionMatcher = (
  excludeFiles: readonly string[],
  modes: readonly ExclusionMatchMode[],
): ((filePath: string) => boolean) => {
  const tokens = excludeFiles
    .map((token) => normalizeSeparators(token.trim()))
    .filter((token) => token.length > 0);
  const enabled = new Set(modes);

  if (tokens.length === 0 || enabled.size === 0) {
    return () => false;
  }

  return (filePath) => {
    const normalizedPath = normalizeSeparators(filePath);
    const fileName = basenameOf(normalizedPath);

    return tokens.some(
      (token) =>
        (enabled.has("basename") && token === fileName) ||
        (enabled.has("substring") && normalizedPath.includes(token)) ||
        (enabled.has("suffix") && normalizedPath.endsWith(token)),
    );
  };
};

export const createAuthorFilter = (authors: readonly string[]): ((authorName: string) => boolean) => {
  const allowed = new Set(
    authors.map((author) => author.trim().toLowerCase()).filter((author) => author.length > 0),
  );

  if (allowed.size === 0) {
    return () => true;
  }

  return (authorName) => allowed.has(authorName.trim().toLowerCase());
};
