/**
 * Core module exports for @backtrack/core
 *
 * This package provides:
 * - The unified configuration system
 * - Scoped console loggers gated by the configured level
 */

// Configuration System
export {
  config,
  defineConfig,
  LOG_LEVELS,
  type BacktrackConfig,
  type LimitsConfig,
  type LogLevel,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LoggedLevel } from "./logger.js";
