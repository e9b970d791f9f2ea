/**
 * @otpkeep/types
 *
 * Interfaces shared between otpkeep packages
 *
 * @packageDocumentation
 */

/**
 * Log levels, lowest first
 */
export type LogLevel = "debug" | "info" | "notice" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "notice",
  "warn",
  "error",
];

/**
 * Logger handed to the store and the vault
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  notice(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger configuration
 */
export interface LoggerConf {
  /** Minimum level written (default: notice) */
  logLevel?: LogLevel;
}
