import { describe, expect, it } from "vitest";
import { Logger, parseLogLevel } from "./logger";
import { LogLevel } from "./types";

function capture(): { lines: Array<{ level: LogLevel; payload: Record<string, unknown> }>; writer: (level: LogLevel, line: string) => void } {
  const lines: Array<{ level: LogLevel; payload: Record<string, unknown> }> = [];
  return {
    lines,
    writer: (level, line) => {
      lines.push({ level, payload: JSON.parse(line) });
    },
  };
}

describe("Logger", () => {
  it("writes one JSON object per event with context and fields", () => {
    const { lines, writer } = capture();
    const logger = new Logger({ component: "extract", runId: "run_test" }, writer);

    logger.info("extract_start", { partitionId: "p-1", attempt: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("info");
    expect(lines[0].payload).toMatchObject({
      level: "info",
      msg: "extract_start",
      component: "extract",
      runId: "run_test",
      partitionId: "p-1",
      attempt: 2,
    });
    expect(typeof lines[0].payload.ts).toBe("string");
  });

  it("child loggers keep the run id and switch component", () => {
    const { lines, writer } = capture();
    const logger = new Logger({ component: "cli", runId: "run_a" }, writer);

    logger.child("source").warn("source_retry");

    expect(lines[0].payload).toMatchObject({ component: "source", runId: "run_a", level: "warn" });
  });

  it("drops events below the minimum level", () => {
    const { lines, writer } = capture();
    const logger = new Logger({ component: "cli", runId: "run_a", minLevel: "warn" }, writer);

    logger.debug("noise");
    logger.info("noise");
    logger.error("boom");

    expect(lines.map((line) => line.payload.msg)).toEqual(["boom"]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(parseLogLevel(" DEBUG ", "info")).toBe("debug");
  });

  it("falls back on unknown values", () => {
    expect(parseLogLevel("verbose", "info")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
