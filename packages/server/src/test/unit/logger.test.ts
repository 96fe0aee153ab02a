/**
 * Unit tests for the structured stderr logger
 */

import { describe, it, expect } from "vitest";
import { Logger, datasetLogSink, errorCode, parseLogLevel } from "../../observability/logger.js";

function capture(minLevel: Parameters<typeof parseLogLevel>[0]): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(parseLogLevel(minLevel), (line) => lines.push(line));
  return { logger, lines };
}

describe("parseLogLevel", () => {
  it("should accept known levels in any case", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel(" WARN ")).toBe("warn");
  });

  it("should default to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});

describe("errorCode", () => {
  it("should read a code field", () => {
    expect(errorCode({ code: "ENOENT" })).toBe("ENOENT");
    expect(errorCode({ code: -32602 })).toBe("-32602");
  });

  it("should fall back to UNKNOWN", () => {
    expect(errorCode(new Error("boom"))).toBe("UNKNOWN");
    expect(errorCode("boom")).toBe("UNKNOWN");
    expect(errorCode(null)).toBe("UNKNOWN");
  });
});

describe("Logger", () => {
  it("should write one JSON object per line", () => {
    const { logger, lines } = capture("debug");
    logger.info("service.init", { records: 3 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "");
    expect(entry).toEqual({ ts: expect.any(String), level: "info", event: "service.init", records: 3 });
  });

  it("should drop events below the minimum level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => JSON.parse(line).event)).toEqual(["c", "d"]);
  });

  it("should log successful tool calls at info", () => {
    const { logger, lines } = capture("info");
    logger.toolCall("get_stats", 4, true);

    expect(JSON.parse(lines[0] ?? "")).toEqual(
      expect.objectContaining({ level: "info", event: "tool.success", tool: "get_stats", duration_ms: 4 })
    );
  });

  it("should log failed tool calls with the error code", () => {
    const { logger, lines } = capture("error");
    const err = Object.assign(new Error("Invalid pagination request: bad"), { code: "E_PRECONDITION" });
    logger.toolCall("list_networks", 2, false, err);

    expect(JSON.parse(lines[0] ?? "")).toEqual(
      expect.objectContaining({
        level: "error",
        event: "tool.error",
        tool: "list_networks",
        err_code: "E_PRECONDITION",
        err_message: "Invalid pagination request: bad",
      })
    );
  });
});

describe("datasetLogSink", () => {
  it("should forward dataset events with their details", () => {
    const { logger, lines } = capture("info");
    const sink = datasetLogSink(logger);

    sink({ level: "warn", event: "dataset.reload.kept", source: "net.json", message: "broken", details: { records: 5 } });

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      ts: expect.any(String),
      level: "warn",
      event: "dataset.reload.kept",
      source: "net.json",
      message: "broken",
      records: 5,
    });
  });

  it("should respect the logger's minimum level", () => {
    const { logger, lines } = capture("info");
    const sink = datasetLogSink(logger);

    sink({ level: "debug", event: "dataset.load", source: "net.json", details: { records: 5, dropped: 0 } });
    sink({ level: "info", event: "dataset.open", source: "net.json" });

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { ts: expect.any(String), level: "info", event: "dataset.open", source: "net.json" },
    ]);
  });
});
