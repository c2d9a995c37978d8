/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for peglogic packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: PEGLOGIC_* (highest priority, for CI overrides)
 * 2. Config files: peglogic.config.js, .peglogicrc, package.json "peglogic" key, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@peglogic/core";
 *
 * config.get("log.level")               // → "warn"
 * config.get("grammar.warnings")        // → true
 *
 * config.set({ log: { level: "silent" } });
 * ```
 *
 * @example Environment variables
 * ```bash
 * PEGLOGIC_LOG_LEVEL=debug npm test
 * PEGLOGIC_GRAMMAR_WARNINGS=0 node app.js
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LogConfig {
  /** Lowest level that reaches the console */
  level?: LogLevel;
}

export interface GrammarConfig {
  /** Report aborted left-recursive rule invocations */
  warnings?: boolean;
}

/**
 * Full peglogic configuration schema.
 */
export interface PeglogicConfig {
  /** Enable debug mode (forces log level "debug") */
  debug?: boolean;
  log?: LogConfig;
  grammar?: GrammarConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "PEGLOGIC_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   PEGLOGIC_DEBUG=1              → { debug: true }
 *   PEGLOGIC_LOG_LEVEL=silent     → { log: { level: "silent" } }
 */
function loadConfigFromEnv(): PeglogicConfig {
  const envConfig: PeglogicConfig = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator, as does a single one
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
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
  let current: unknown = obj;

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
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "peglogic";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `.${MODULE_NAME}rc.mjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.mjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    console.warn(`[peglogic:config] Ignoring unreadable config file: ${String(error)}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: PeglogicConfig = {
    debug: false,
    log: { level: "warn" },
    grammar: { warnings: true },
  };

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: PeglogicConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next access reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Effective log level. `debug: true` wins over `log.level`;
 * unrecognised levels fall back to "warn".
 */
function logLevel(): LogLevel {
  if (get("debug") === true) return "debug";
  const level = get("log.level");
  return isLogLevel(level) ? level : "warn";
}

/**
 * Whether the grammar recursion guard reports aborted invocations.
 */
function grammarWarnings(): boolean {
  return get("grammar.warnings") !== false;
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
  grammarWarnings,
} as const;

export { LOG_LEVELS };
