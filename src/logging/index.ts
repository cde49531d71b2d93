/**
 * Logging Module - Public API
 *
 * Structured logging for docstream, built on Pino with secret redaction and
 * component-based context.
 *
 * ```typescript
 * initializeLogger({ level: "info", format: "pretty" });
 *
 * const logger = getComponentLogger("sources:fs");
 * logger.info({ root }, "Walking directory");
 * ```
 *
 * ## Environment Variables
 *
 * - `LOG_LEVEL`: fatal|error|warn|info|debug|trace|silent
 * - `LOG_FORMAT`: json|pretty
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  isLoggerInitialized,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS, SECRET_PATTERNS, looksLikeSecret, sanitizeError, serializeError } from "./redactors.js";
