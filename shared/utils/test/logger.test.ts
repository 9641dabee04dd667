import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger, LogLevel, parseLogLevel } from "../src/logger";

describe("Logger", () => {
  beforeEach(() => {
    Logger.resetInstance();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should only write messages at or above its level", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.warn("shown");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("should prefix messages with the context", () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = Logger.createFresh({ context: "BatchOrchestrator" });

    logger.info("Batch started", { batchId: "b1" });

    const [message, context] = infoSpy.mock.calls[0] ?? [];
    expect(String(message)).toMatch(/\[BatchOrchestrator\] Batch started$/);
    expect(context).toEqual({ batchId: "b1" });
  });

  it("should nest child contexts", () => {
    const parent = Logger.createFresh({ context: "Pipeline" });
    const child = parent.child("DispatchLoop");

    expect(child.getContext()).toBe("Pipeline:DispatchLoop");
  });

  it("should send info to stderr when configured", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = Logger.createFresh({ useStderr: true });

    logger.info("to stderr");

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("should return the same singleton until reset", () => {
    const first = Logger.getInstance();
    expect(Logger.getInstance()).toBe(first);

    Logger.resetInstance();
    expect(Logger.getInstance()).not.toBe(first);
  });

  it("should write nothing when silent", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.NONE });

    logger.error("nothing");

    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe("parseLogLevel", () => {
  it("should parse level names case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" warn ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("silent")).toBe(LogLevel.NONE);
  });

  it("should fall back for unknown or missing names", () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel("loud", LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
