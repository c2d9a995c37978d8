/**
 * @peglogic/core
 *
 * Ambient infrastructure shared by the peglogic packages:
 * - Layered configuration (env, config files, programmatic)
 * - Scoped, level-gated console logging
 * - The base error class
 */

export { config, type PeglogicConfig, type LogConfig, type GrammarConfig, type LogLevel } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { PeglogicError } from "./errors.js";
