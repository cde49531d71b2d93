/**
 * Utilities module exports
 */

// Retry utilities for remote calls with exponential backoff
export {
  withRetry,
  defaultExponentialBackoff,
  createExponentialBackoff,
  retryAfterHint,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, RetryOptions } from "./retry.js";

export { Mutex } from "./mutex.js";
