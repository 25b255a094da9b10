/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for backtrack packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: BACKTRACK_* (highest priority, for CI overrides)
 * 2. Config files: the first of package.json ("backtrack" key), .backtrackrc,
 *    .backtrackrc.json, ..., backtrack.config.js found in the working directory
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@backtrack/core";
 *
 * config.get("logLevel")        // → "warn"
 * config.get("limits.maxReads") // → undefined
 *
 * config.set({ tracing: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

/**
 * Resource limits applied by the parse driver.
 */
export interface LimitsConfig {
  /** Abort a parse after this many reads from the text source */
  maxReads?: number;
}

/**
 * Full backtrack configuration schema.
 */
export interface BacktrackConfig {
  /** Minimum level printed by loggers */
  logLevel?: LogLevel;
  /** Record recognizer invocations in a RecognitionTracer */
  tracing?: boolean;
  /** Driver limits */
  limits?: LimitsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let fileConfig: ConfigRecord = {};
let envConfig: ConfigRecord = {};
let programmaticConfig: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "backtrack";
const ENV_PREFIX = "BACKTRACK_";

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with BACKTRACK_ are parsed into the config object.
 *
 * Examples:
 *   BACKTRACK_TRACING=1            → { tracing: true }
 *   BACKTRACK_LOGLEVEL=debug       → { logLevel: "debug" }
 *   BACKTRACK_LIMITS__MAXREADS=500 → { limits: { maxReads: 500 } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/__/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return normalizeKeys(envConfig);
}

const KNOWN_KEYS: Record<string, string> = {
  loglevel: "logLevel",
  maxreads: "maxReads",
};

/**
 * Restore the camelCase spelling of known options after env-var lowering.
 */
function normalizeKeys(obj: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = {};
  for (const [key, value] of Object.entries(obj)) {
    result[KNOWN_KEYS[key] ?? key] = isRecord(value) ? normalizeKeys(value) : value;
  }
  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search();
  if (!result || result.isEmpty) {
    return {};
  }

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new TypeError(`[backtrack] Config file ${result.filepath} must export an object`);
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: BacktrackConfig = {
  logLevel: "warn",
  tracing: false,
  limits: {},
};

/**
 * Rebuild the merged store from its layers.
 * Priority: env vars > config files > programmatic > defaults
 */
function rebuildStore(): void {
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, programmaticConfig), fileConfig), envConfig);
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  fileConfig = loadConfigFromFiles();
  envConfig = loadConfigFromEnv();
  rebuildStore();
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "limits.maxReads", "tracing")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with earlier `set` calls; config files and env vars still win.
 */
function set(values: BacktrackConfig): void {
  initializeConfig();
  programmaticConfig = deepMerge(programmaticConfig, values);
  rebuildStore();
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get a copy of all configuration values.
 */
function getAll(): Record<string, unknown> {
  initializeConfig();
  return structuredClone(configStore);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  fileConfig = {};
  envConfig = {};
  programmaticConfig = {};
  configLoaded = false;
  configFilePath = undefined;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * The configured log level; unknown values fall back to "warn".
 */
function logLevel(): LogLevel {
  const value = get("logLevel");
  return isLogLevel(value) ? value : "warn";
}

function tracingEnabled(): boolean {
  return get("tracing") === true;
}

/**
 * The configured read budget, or undefined when parses are unbounded.
 */
function maxReads(): number | undefined {
  const value = get("limits.maxReads");
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  return undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  logLevel,
  tracingEnabled,
  maxReads,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: BacktrackConfig): BacktrackConfig {
  return cfg;
}
