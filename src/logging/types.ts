/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * Log levels supported by the logger, highest severity first.
 * `silent` suppresses everything (typically used in tests).
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Log output format
 * - json: Structured JSON for log aggregation
 * - pretty: Human-readable colorized output for terminals
 */
export type LogFormat = "json" | "pretty";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;

  format: LogFormat;

  /**
   * Optional custom output stream. When provided, logs are written here
   * instead of stderr.
   * @internal Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context bound to every line a component logger writes
 */
export interface ComponentContext {
  /**
   * Component name, colon notation for hierarchy (e.g. "sources:git", "storage:sqlite")
   */
  component: string;

  /**
   * Optional correlation ID, e.g. one per CLI invocation
   */
  requestId?: string;
}

/**
 * Structured log entry as written by the JSON format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  time: string;
  level: string;
  component: string;
  msg: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Metric emitted as a log event, e.g. `{ metric: "ingestion.source_duration_ms", value: 145 }`
 */
export interface MetricLogEntry extends LogEntry {
  metric: string;
  value: number;
}
