export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";
export const COMMIT_MESSAGE_TERMINATOR = "\u001d";

// hash, short hash, parents, author name, committer time, committer ISO date, raw body
export const GIT_LOG_FORMAT = [
  "%x1e%H",
  "%h",
  "%P",
  "%an",
  "%ct",
  "%cI",
  "%B%x1d",
].join("%x1f");
