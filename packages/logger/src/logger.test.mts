import { describe, expect, it, vi } from "vitest";

import {
  createLogger,
  isLoggerLevel,
  LoggerConfigError,
  loggerFactory,
  loggerOptionsFromEnv,
} from "./index.mjs";

import type { LoggerFactoryResult } from "./index.mjs";

const backendDouble = () => ({
  trace: vi.fn<(...args: unknown[]) => void>(),
  debug: vi.fn<(...args: unknown[]) => void>(),
  info: vi.fn<(...args: unknown[]) => void>(),
  warn: vi.fn<(...args: unknown[]) => void>(),
  error: vi.fn<(...args: unknown[]) => void>(),
  fatal: vi.fn<(...args: unknown[]) => void>(),
  log: vi.fn<(...args: unknown[]) => void>(),
});

describe("loggerFactory", () => {
  it("should create a logger", () => {
    const { logger } = loggerFactory({ silent: true });
    expect(logger).toBeDefined();
  });

  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory({ silent: true });
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should route each level to the matching axe method", () => {
    const { logger, axeLogger } = loggerFactory({ silent: true });
    const info = vi.spyOn(axeLogger, "info").mockResolvedValue(undefined);
    const debug = vi.spyOn(axeLogger, "debug").mockResolvedValue(undefined);

    logger.info("test message", { key: "value" });
    logger.debug("comparisons", { count: 3 });

    expect(info).toHaveBeenCalledWith("test message", { key: "value" });
    expect(debug).toHaveBeenCalledWith("comparisons", { count: 3 });
  });

  it("should expose the axe instance through a named result type", () => {
    const result: LoggerFactoryResult = loggerFactory({ silent: true });
    expect(typeof result.axeLogger.info).toBe("function");
    expect(typeof result.logger.logMessage).toBe("function");
  });

  it("should deliver records to the configured backend", async () => {
    const backend = backendDouble();
    const { axeLogger } = loggerFactory({ backend });

    await axeLogger.info("reaches the backend");

    expect(backend.info).toHaveBeenCalledTimes(1);
    expect(backend.info.mock.calls[0]?.[0]).toBe("reaches the backend");
  });

  it("should keep records below the level away from the backend", async () => {
    const backend = backendDouble();
    const { axeLogger } = loggerFactory({ backend, level: "warn" });

    await axeLogger.debug("too quiet");

    expect(backend.debug).not.toHaveBeenCalled();
  });
});

describe("loggerOptionsFromEnv", () => {
  it("should default to info and not silent", () => {
    expect(loggerOptionsFromEnv({})).toEqual({ level: "info", silent: false });
  });

  it("should read the level case-insensitively", () => {
    expect(loggerOptionsFromEnv({ RANGEWISE_LOG_LEVEL: " DEBUG " })).toEqual({
      level: "debug",
      silent: false,
    });
  });

  it("should accept true and 1 as silent", () => {
    expect(loggerOptionsFromEnv({ RANGEWISE_LOG_SILENT: "true" }).silent).toBe(
      true,
    );
    expect(loggerOptionsFromEnv({ RANGEWISE_LOG_SILENT: "1" }).silent).toBe(
      true,
    );
    expect(loggerOptionsFromEnv({ RANGEWISE_LOG_SILENT: "no" }).silent).toBe(
      false,
    );
  });

  it("should reject unknown levels", () => {
    expect(() =>
      loggerOptionsFromEnv({ RANGEWISE_LOG_LEVEL: "verbose" }),
    ).toThrowError(LoggerConfigError);
    expect(() =>
      loggerOptionsFromEnv({ RANGEWISE_LOG_LEVEL: "verbose" }),
    ).toThrowError(
      'Invalid RANGEWISE_LOG_LEVEL "verbose": expected one of trace, debug, info, warn, error, fatal',
    );
  });
});

describe("isLoggerLevel", () => {
  it("should recognise only the six levels", () => {
    expect(isLoggerLevel("fatal")).toBe(true);
    expect(isLoggerLevel("log")).toBe(false);
  });
});

describe("createLogger", () => {
  it("should build a logger from an explicit env", () => {
    const logger = createLogger({ RANGEWISE_LOG_SILENT: "1" });
    expect(typeof logger.warn).toBe("function");
  });
});
