/**
 * Core exports.
 */

export * from "./errors.js";
export { configureLogger, getLoggerState, isDebugEnabled, resetLogger } from "./logger.js";
export { getVersion } from "./version.js";
