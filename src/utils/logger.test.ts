import { describe, it, expect } from "vitest";
import { Logger } from "./logger";

function capture(level: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  return { lines, logger: new Logger(level, (line) => lines.push(line)) };
}

describe("Logger", () => {
  it("drops messages below the threshold", () => {
    const { lines, logger } = capture("warn");
    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[WARN] shown");
  });

  it("always reports errors", () => {
    const { lines, logger } = capture("error");
    logger.warn("hidden");
    logger.error("Failed to convert a.py: invalid syntax");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[ERROR] Failed to convert a.py: invalid syntax");
  });

  it("adds the stack only at debug level", () => {
    const error = new Error("boom");

    const quiet = capture("info");
    quiet.logger.error("boom", error);
    expect(quiet.lines).toHaveLength(1);

    const verbose = capture("debug");
    verbose.logger.error("boom", error);
    expect(verbose.lines).toHaveLength(2);
  });

  it("reports which levels pass the threshold", () => {
    const { logger } = capture("info");
    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("info")).toBe(true);
    expect(logger.isEnabled("error")).toBe(true);
  });
});
