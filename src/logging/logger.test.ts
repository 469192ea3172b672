/**
 * Report Logger Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  ConsoleTransport,
  MemoryTransport,
  createDefaultFormatter,
  createReportLogger,
  createSilentLogger,
  isLogLevel,
  shouldLog,
  type LogEntry,
} from "./logger.js";

describe("log levels", () => {
  it("should compare levels by priority", () => {
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("fatal", "fatal")).toBe(true);
  });

  it("should recognise level names only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("createDefaultFormatter", () => {
  const entry: LogEntry = {
    timestamp: new Date("2026-01-31T12:00:00.000Z"),
    level: "warn",
    subsystem: "report/enricher",
    message: "Enrichment failed",
    metadata: { source: "metrics" },
    region: "us-east-1",
    workspaceId: "ws-1",
  };

  it("should render timestamp, level, subsystem, context and metadata", () => {
    const format = createDefaultFormatter({ colors: false });

    expect(format(entry)).toBe(
      '2026-01-31T12:00:00.000Z WARN  [report/enricher] Enrichment failed (region=us-east-1 workspace=ws-1) {"source":"metrics"}',
    );
  });

  it("should leave out what is switched off", () => {
    const format = createDefaultFormatter({ colors: false, timestamps: false, includeMetadata: false });

    expect(format({ ...entry, region: undefined, workspaceId: undefined })).toBe(
      "WARN  [report/enricher] Enrichment failed",
    );
  });
});

describe("ReportLogger", () => {
  it("should drop entries below the configured level", () => {
    const transport = new MemoryTransport();
    const logger = createReportLogger("report", { level: "warn", transports: [transport] });

    logger.info("hidden");
    logger.error("shown");

    expect(transport.messages()).toEqual(["shown"]);
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  it("should name child loggers after their parent", () => {
    const transport = new MemoryTransport();
    const logger = createReportLogger("report", { transports: [transport] });

    logger.child("directory").info("bound");

    expect(transport.entries[0].subsystem).toBe("report/directory");
  });

  it("should carry context into every entry", () => {
    const transport = new MemoryTransport();
    const logger = createReportLogger("report", { transports: [transport] })
      .withContext({ region: "eu-west-1" })
      .withContext({ workspaceId: "ws-9" });

    logger.child("enricher").warn("failed");

    expect(transport.entries[0]).toMatchObject({
      subsystem: "report/enricher",
      region: "eu-west-1",
      workspaceId: "ws-9",
    });
  });

  it("should redact secrets from messages and nested metadata", () => {
    const transport = new MemoryTransport();
    const logger = createReportLogger("report", { transports: [transport], secrets: ["test-secret", ""] });

    logger.warn("bind with test-secret failed", { bind: { password: "test-secret" }, attempt: 2 });

    expect(transport.entries[0].message).toBe("bind with [REDACTED] failed");
    expect(transport.entries[0].metadata).toEqual({ bind: { password: "[REDACTED]" }, attempt: 2 });
  });

  it("should write console output to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createReportLogger("report", {
      transports: [new ConsoleTransport({ formatter: (e) => `${e.level}:${e.message}` })],
    });

    logger.info("hello");

    expect(error).toHaveBeenCalledWith("info:hello");
    error.mockRestore();
  });

  it("should discard everything when silent", () => {
    const logger = createSilentLogger();

    expect(logger.isLevelEnabled("error")).toBe(false);
    expect(logger.isLevelEnabled("fatal")).toBe(true);
  });
});
