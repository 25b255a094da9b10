/**
 * Scoped console loggers.
 *
 * Every line is prefixed with `[backtrack:<scope>]`. The level is read from
 * `config.logLevel()` on each call, so `config.set({ logLevel })` takes effect
 * for loggers that already exist.
 */

import { config, LOG_LEVELS, type LogLevel } from "./config.js";

export type LoggedLevel = Exclude<LogLevel, "silent">;

export interface Logger {
  readonly scope: string;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  /** Whether a message at `level` would currently be printed. */
  isEnabled(level: LoggedLevel): boolean;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(scope: string): Logger {
  const prefix = `[backtrack:${scope}]`;

  const isEnabled = (level: LoggedLevel): boolean => rank(level) <= rank(config.logLevel());

  const emit = (level: LoggedLevel, message: string, details: unknown[]): void => {
    if (!isEnabled(level)) return;
    console[level](`${prefix} ${message}`, ...details);
  };

  return {
    scope,
    error: (message, ...details) => emit("error", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    info: (message, ...details) => emit("info", message, details),
    debug: (message, ...details) => emit("debug", message, details),
    isEnabled,
  };
}
