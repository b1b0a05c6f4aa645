import {
  COMMIT_FIELD_SEPARATOR,
  COMMIT_MESSAGE_TERMINATOR,
  COMMIT_RECORD_SEPARATOR,
} from "../domain/git-log-format.js";
import type { GitCommitRecord, GitDiffStat, GitFileChange } from "../domain/history-types.js";

export type ParseGitLogProgressEvent = {
  parsedRecords: number;
  totalRecords: number;
};

const PROGRESS_INTERVAL = 500;

type NumstatLine = {
  change: GitFileChange;
  countsReadable: boolean;
};

const parseInteger = (value: string): number | null => {
  if (!/^\d+$/.test(value)) {
    return null;
  }

  return Number.parseInt(value, 10);
};

const parseTimezoneOffsetMinutes = (isoDate: string): number => {
  const match = isoDate.match(/([+-])(\d{2}):?(\d{2})$/);
  if (match === null) {
    return 0;
  }

  const [, sign, hours, minutes] = match;
  const magnitude = Number.parseInt(hours ?? "0", 10) * 60 + Number.parseInt(minutes ?? "0", 10);
  return sign === "-" ? -magnitude : magnitude;
};

const C_ESCAPES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
  '"': 0x22,
  "\\": 0x5c,
};

/**
 * Decodes a path git wrapped in C-style quotes. Octal escapes are raw bytes of a UTF-8
 * sequence. Returns null when the value is not a single well-formed quoted string.
 */
export const unquoteGitPath = (value: string): string | null => {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return null;
  }

  const bytes: number[] = [];
  const body = value.slice(1, -1);
  let index = 0;
  while (index < body.length) {
    const char = String.fromCodePoint(body.codePointAt(index) ?? 0);
    if (char === '"') {
      return null;
    }

    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      index += char.length;
      continue;
    }

    const next = body.charAt(index + 1);
    const octal = body.slice(index + 1, index + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(Number.parseInt(octal, 8));
      index += 4;
      continue;
    }

    const escaped = C_ESCAPES[next];
    if (escaped === undefined) {
      return null;
    }
    bytes.push(escaped);
    index += 2;
  }

  return Buffer.from(bytes).toString("utf8");
};

const parseRenamedPath = (pathSpec: string): string => {
  if (!pathSpec.includes(" => ")) {
    return pathSpec;
  }

  const braceRenameMatch = pathSpec.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braceRenameMatch !== null) {
    const [, prefix = "", , renamedTo = "", suffix = ""] = braceRenameMatch;
    return `${prefix}${renamedTo}${suffix}`.replace(/\/{2,}/g, "/");
  }

  const parts = pathSpec.split(" => ");
  const finalPart = parts[parts.length - 1];
  return finalPart ?? pathSpec;
};

// A rename may be quoted as a whole or one side at a time.
const resolveFilePath = (pathRaw: string): string => {
  const unquoted = unquoteGitPath(pathRaw);
  if (unquoted !== null) {
    return parseRenamedPath(unquoted);
  }

  const renamedTo = parseRenamedPath(pathRaw);
  return unquoteGitPath(renamedTo) ?? renamedTo;
};

const parseNumstatLine = (line: string): NumstatLine | null => {
  const parts = line.split("\t");
  if (parts.length < 3) {
    return null;
  }

  const additionsRaw = parts[0] ?? "";
  const deletionsRaw = parts[1] ?? "";
  const pathRaw = parts.slice(2).join("\t");
  if (pathRaw.length === 0) {
    return null;
  }

  // binary files report "-" for both counts
  const additions = additionsRaw === "-" ? 0 : parseInteger(additionsRaw);
  const deletions = deletionsRaw === "-" ? 0 : parseInteger(deletionsRaw);

  return {
    change: {
      filePath: resolveFilePath(pathRaw),
      additions: additions ?? 0,
      deletions: deletions ?? 0,
    },
    countsReadable: additions !== null && deletions !== null,
  };
};

const parseRecord = (record: string): GitCommitRecord | null => {
  const terminatorIndex = record.indexOf(COMMIT_MESSAGE_TERMINATOR);
  if (terminatorIndex < 0) {
    return null;
  }

  const headerParts = record.slice(0, terminatorIndex).split(COMMIT_FIELD_SEPARATOR);
  if (headerParts.length < 7) {
    return null;
  }

  const [hash, shortHash, parentsRaw, authorName, committedAtRaw, committedAtIso] = headerParts;
  if (
    hash === undefined ||
    shortHash === undefined ||
    parentsRaw === undefined ||
    authorName === undefined ||
    committedAtRaw === undefined ||
    committedAtIso === undefined
  ) {
    return null;
  }

  const committedAtUnix = parseInteger(committedAtRaw.trim());
  if (hash.length === 0 || committedAtUnix === null) {
    return null;
  }

  const fileChanges: GitFileChange[] = [];
  let countsReadable = true;
  const numstatLines = record
    .slice(terminatorIndex + 1)
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);

  for (const line of numstatLines) {
    const parsedLine = parseNumstatLine(line);
    if (parsedLine === null) {
      continue;
    }

    fileChanges.push(parsedLine.change);
    countsReadable = countsReadable && parsedLine.countsReadable;
  }

  const diffStat: GitDiffStat | null = countsReadable
    ? fileChanges.reduce(
        (stat, change) => ({
          insertions: stat.insertions + change.additions,
          deletions: stat.deletions + change.deletions,
        }),
        { insertions: 0, deletions: 0 },
      )
    : null;

  return {
    hash,
    shortHash: shortHash.length > 0 ? shortHash : hash.slice(0, 7),
    parentHashes: parentsRaw.split(" ").filter((parent) => parent.length > 0),
    authorName,
    committedAtUnix,
    timezoneOffsetMinutes: parseTimezoneOffsetMinutes(committedAtIso.trim()),
    message: headerParts.slice(6).join(COMMIT_FIELD_SEPARATOR),
    fileChanges,
    diffStat,
  };
};

/**
 * Parses `git log` output produced with the `GIT_LOG_FORMAT` pretty format and `--numstat`.
 * Commits keep the order git emitted them in (newest first for a default log).
 */
export const parseGitLog = (
  rawLog: string,
  onProgress?: (event: ParseGitLogProgressEvent) => void,
): readonly GitCommitRecord[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .filter((record) => record.trim().length > 0);

  const commits: GitCommitRecord[] = [];

  for (let index = 0; index < records.length; index += 1) {
    const record = records[index];
    if (record === undefined) {
      continue;
    }

    const commit = parseRecord(record);
    if (commit !== null) {
      commits.push(commit);
    }

    const parsedRecords = index + 1;
    if (parsedRecords % PROGRESS_INTERVAL === 0 || parsedRecords === records.length) {
      onProgress?.({ parsedRecords, totalRecords: records.length });
    }
  }

  return commits;
};
