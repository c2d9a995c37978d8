/**
 * Scoped console logging.
 *
 * Every message is prefixed with its scope (`[peglogic:grammar] ...`) and
 * gated by the configured level, re-read on each call so that
 * `config.set()` takes effect immediately.
 */

import { config, LOG_LEVELS, type LogLevel } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(config.logLevel());
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug(message) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled("info")) console.info(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`${prefix} ${message}`);
    },
  };
}
