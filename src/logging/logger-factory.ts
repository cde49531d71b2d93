/**
 * Logger Factory
 *
 * Core logging infrastructure built on Pino. Handles root logger creation and
 * component-scoped child loggers.
 *
 * Key features:
 * - Outputs to stderr (stdout carries command output such as search results)
 * - Automatic secret redaction
 * - JSON format for production, pretty-print for development
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS, serializeError } from "./redactors.js";

/**
 * Singleton root logger instance
 */
let rootLogger: pino.Logger | null = null;

function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,
    redact: REDACT_OPTIONS,
    serializers: { err: serializeError },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger with full configuration
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config);

  // Custom stream (log capture in tests)
  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at application startup before any logging occurs.
 *
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ config: { level: config.level, format: config.format } }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or transport failure: plain JSON to stderr, redaction kept
    rootLogger = pino(baseOptions(config), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @throws Error if logger not initialized
 * @internal Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Check whether initializeLogger() has run
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get a component-scoped logger
 *
 * Child logger carrying `component` (and optionally `requestId`) on every line.
 * Use colon notation for hierarchy, e.g. `"sources:git"` or `"storage:sqlite"`.
 *
 * When the root logger has not been initialized (library use without the CLI),
 * a silent logger is returned so that components never throw on logging.
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  if (rootLogger === null) {
    return pino({ level: "silent" });
  }

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return rootLogger.child(context);
}

/**
 * Reset logger (for testing only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
