import Axe from "axe";

import type { AxeInstance } from "axe";

export const LOGGER_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LoggerLevels = (typeof LOGGER_LEVELS)[number];
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export interface LoggerFactoryOptions {
  /** Minimum level that reaches the backing logger. @default "info" */
  level?: LoggerLevels;
  silent?: boolean;
  /** Backing logger handed to axe. @default console */
  backend?: Axe.Logger;
}

export type RangewiseLogger = BaseLogger & {
  logMessage: (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ) => void;
};

export interface LoggerFactoryResult {
  logger: RangewiseLogger;
  axeLogger: AxeInstance;
}

/**
 * Environment variables read by {@link loggerOptionsFromEnv}.
 */
export interface LoggerEnv {
  RANGEWISE_LOG_LEVEL?: string;
  RANGEWISE_LOG_SILENT?: string;
}

export class LoggerConfigError extends Error {
  constructor(
    public readonly variable: keyof LoggerEnv,
    public readonly value: string,
  ) {
    super(
      `Invalid ${variable} "${value}": expected one of ${LOGGER_LEVELS.join(", ")}`,
    );
    this.name = "LoggerConfigError";
  }
}

export const isLoggerLevel = (value: string): value is LoggerLevels =>
  LOGGER_LEVELS.some((level) => level === value);

/**
 * Read logger options from the environment.
 * Unset variables fall back to the defaults; an unknown level is rejected.
 */
export const loggerOptionsFromEnv = (
  env: LoggerEnv,
): LoggerFactoryOptions => {
  const rawLevel = env.RANGEWISE_LOG_LEVEL?.trim().toLowerCase();
  let level: LoggerLevels = "info";
  if (rawLevel) {
    if (!isLoggerLevel(rawLevel)) {
      throw new LoggerConfigError(
        "RANGEWISE_LOG_LEVEL",
        env.RANGEWISE_LOG_LEVEL ?? "",
      );
    }
    level = rawLevel;
  }

  const rawSilent = env.RANGEWISE_LOG_SILENT?.trim().toLowerCase();
  const silent = rawSilent === "true" || rawSilent === "1";

  return { level, silent };
};

/**
 * Level-based logger backed by axe.
 */
export const loggerFactory = (
  options: LoggerFactoryOptions = {},
): LoggerFactoryResult => {
  const axeLogger = new Axe({
    level: options.level ?? "info",
    levels: [...LOGGER_LEVELS],
    silent: options.silent ?? false,
    name: false,
    //don't let axe read git or package.json for every record
    appInfo: false,
    ...(options.backend ? { logger: options.backend } : {}),
  });

  const logger: RangewiseLogger = {
    logMessage(level, message, meta) {
      void axeLogger[level](message, meta);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, axeLogger };
};

/**
 * Logger configured from `env` (the process environment by default).
 */
export const createLogger = (env: LoggerEnv = process.env): RangewiseLogger =>
  loggerFactory(loggerOptionsFromEnv(env)).logger;

export default loggerFactory;
