import { describe, expect, it } from "vitest";
import { createStderrLogger, parseLogLevel } from "./logger.js";

const recordingLogger = (level: Parameters<typeof createStderrLogger>[0]) => {
  const lines: string[] = [];
  const logger = createStderrLogger(level, (line) => lines.push(line));
  return { lines, logger };
};

describe("createStderrLogger", () => {
  it("writes prefixed lines at or above the configured level", () => {
    const { lines, logger } = recordingLogger("warn");

    logger.error("boom");
    logger.warn("careful");
    logger.info("hidden");
    logger.debug("hidden");

    expect(lines).toEqual(["[gitgrade] ERROR boom", "[gitgrade] WARN careful"]);
  });

  it("writes nothing when silent", () => {
    const { lines, logger } = recordingLogger("silent");

    logger.error("boom");

    expect(lines).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
