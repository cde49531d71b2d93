/**
 * Retry utility with exponential backoff
 *
 * Used around remote calls (repository listing APIs). Supports:
 * - Configurable retry attempts and exponential backoff
 * - Conditional retry based on error type
 * - Retry-after hints carried by errors (`retryAfterMs`)
 */

/**
 * Configuration for retry behavior with exponential backoff
 *
 * @example
 * ```typescript
 * // Delays: 1s → 2s → 4s (capped at 60s)
 * const config: RetryConfig = { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 60000, backoffMultiplier: 2 };
 * ```
 */
export interface RetryConfig {
  /**
   * Maximum number of retry attempts (0 = initial attempt only)
   */
  maxRetries: number;

  /**
   * Delay before the first retry
   */
  initialDelayMs: number;

  /**
   * Upper bound for any single delay
   */
  maxDelayMs: number;

  /**
   * Multiplier applied to the delay after each retry
   */
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
};

/**
 * Read a retry-after hint (milliseconds) from an error, if it carries one
 */
export function retryAfterHint(error: Error): number | undefined {
  if ("retryAfterMs" in error && typeof error.retryAfterMs === "number" && error.retryAfterMs >= 0) {
    return error.retryAfterMs;
  }
  return undefined;
}

/**
 * Create an exponential backoff calculator
 *
 * delay = min(max(initialDelayMs * backoffMultiplier^attempt, retryAfter), maxDelayMs)
 *
 * @example
 * ```typescript
 * const backoff = createExponentialBackoff({ initialDelayMs: 1000, maxDelayMs: 60000, backoffMultiplier: 2 });
 * backoff(2, new Error("x")); // 4000
 * ```
 */
export function createExponentialBackoff(
  config: Pick<RetryConfig, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier">
): (attempt: number, error: Error) => number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier } = config;

  return (attempt: number, error: Error): number => {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    const hinted = retryAfterHint(error) ?? 0;
    return Math.min(Math.max(delay, hinted), maxDelayMs);
  };
}

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of retry attempts (0 = initial attempt only)
   */
  maxRetries: number;

  /**
   * Whether an error should trigger a retry. Defaults to retrying everything.
   */
  shouldRetry?: (error: Error) => boolean;

  /**
   * Delay before retry number `attempt` (0-based)
   */
  calculateBackoff?: (attempt: number, error: Error) => number;

  /**
   * Invoked before each retry, after the delay has been computed
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  /**
   * Injected for tests; defaults to a setTimeout-based sleep
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default backoff: 1s, 2s, 4s, 8s, ...
 */
export function defaultExponentialBackoff(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Execute an async operation with automatic retry on failure
 *
 * @throws The last error encountered once retries are exhausted, or the first
 * error `shouldRetry` rejects
 *
 * @example
 * ```typescript
 * const page = await withRetry(() => fetchPage(cursor), {
 *   maxRetries: 3,
 *   shouldRetry: (error) => error instanceof GitHubNetworkError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    shouldRetry = () => true,
    calculateBackoff = defaultExponentialBackoff,
    onRetry,
    sleep: wait = sleep,
  } = options;

  // Attempt 0 is the initial try, attempts 1-N are retries
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (caught) {
      const error = toError(caught);

      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = calculateBackoff(attempt, error);
      onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }
}
