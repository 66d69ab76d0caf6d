import { describe, expect, it } from "vitest";
import { createStderrLogger, formatLogLine, parseLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("accepts known levels and falls back to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("silent")).toBe("silent");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});

describe("createStderrLogger", () => {
  it("writes prefixed lines at or above the configured level", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("warn", (line) => lines.push(line));

    logger.error("boom");
    logger.warn("careful");
    logger.info("hello");
    logger.debug("details");

    expect(lines).toEqual(["[depintel] ERROR boom\n", "[depintel] WARN careful\n"]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("silent", (line) => lines.push(line));

    logger.error("boom");

    expect(lines).toEqual([]);
  });
});

describe("formatLogLine", () => {
  it("upper-cases the level", () => {
    expect(formatLogLine("debug", "graph built")).toBe("[depintel] DEBUG graph built\n");
  });
});
