/**
 * @otpkeep/logger
 *
 * Console logger with level filtering. `info` goes to console.log,
 * `notice` and `warn` to console.warn.
 *
 * @packageDocumentation
 */

import { LOG_LEVELS } from "@otpkeep/types";
import type { Logger, LoggerConf, LogLevel } from "@otpkeep/types";

export const DEFAULT_LOG_LEVEL: LogLevel = "notice";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  debug: "debug",
  info: "log",
  notice: "warn",
  warn: "warn",
  error: "error",
};

/**
 * Check a string against the known levels
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

/**
 * Build a logger
 * @param conf Logger configuration
 * @param userLogger Prefix each line with its level in brackets
 */
export function createLogger(
  conf: LoggerConf = {},
  userLogger = false,
): Logger {
  const threshold = LOG_LEVELS.indexOf(conf.logLevel ?? DEFAULT_LOG_LEVEL);

  const write =
    (level: LogLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      const line = userLogger ? `[${level}] ${message}` : message;
      console[CONSOLE_METHODS[level]](line);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    notice: write("notice"),
    warn: write("warn"),
    error: write("error"),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  notice: () => {},
  warn: () => {},
  error: () => {},
};

export default createLogger;
