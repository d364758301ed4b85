/**
 * Utility functions
 */

export * from './constants.js';
export * from './address.js';
export * from './buffer-utils.js';
export * from './signing.js';
export { canonicalizeJson, canonicalJsonBytes, toJsonValue } from './canonical-json.js';
export type { JsonValue } from './canonical-json.js';
export { logger, configureLogger, isLogLevel } from './logger.js';
export type { LogLevel, LoggerConfig } from './logger.js';
