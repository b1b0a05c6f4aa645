export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const messageLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = Record<MessageLevel, (message: string) => void>;

export type LogWriter = (line: string) => void;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export const createStderrLogger = (level: LogLevel, writer: LogWriter = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const threshold = messageLevelRank[level];
  const emitter =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (messageLevelRank[messageLevel] <= threshold) {
        writer(`[gitgrade] ${messageLevel.toUpperCase()} ${message}`);
      }
    };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

/** Unknown or missing values fall back to `info`. */
export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};
