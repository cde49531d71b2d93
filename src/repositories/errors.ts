/**
 * Error classes for repository listing against the GitHub API.
 *
 * @module repositories/errors
 */

/**
 * Base error class for GitHub listing errors.
 */
export abstract class GitHubClientError extends Error {
  public abstract readonly code: string;
  public readonly retryable: boolean;
  public override readonly cause?: unknown;

  constructor(message: string, retryable: boolean = false, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = retryable;
    this.cause = cause;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * 401, or 403 without rate limiting: missing, expired or under-scoped token.
 */
export class GitHubAuthenticationError extends GitHubClientError {
  public readonly code = "GITHUB_AUTH_ERROR" as const;

  constructor(message: string = "GitHub authentication failed", cause?: unknown) {
    super(message, false, cause);
  }
}

/**
 * Rate limit exhausted. Retryable; `retryAfterMs` feeds the backoff.
 */
export class GitHubRateLimitError extends GitHubClientError {
  public readonly code = "GITHUB_RATE_LIMIT" as const;
  public readonly resetAt?: Date;
  public readonly retryAfterMs?: number;

  constructor(message: string, resetAt?: Date, retryAfterMs?: number, cause?: unknown) {
    super(message, true, cause);
    this.resetAt = resetAt;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * The user or resource asked for does not exist.
 */
export class GitHubNotFoundError extends GitHubClientError {
  public readonly code = "GITHUB_NOT_FOUND" as const;
  public readonly resource?: string;

  constructor(message: string, resource?: string, cause?: unknown) {
    super(message, false, cause);
    this.resource = resource;
  }
}

/**
 * Timeouts and connection failures. Retryable.
 */
export class GitHubNetworkError extends GitHubClientError {
  public readonly code = "GITHUB_NETWORK_ERROR" as const;

  constructor(message: string, cause?: unknown) {
    super(message, true, cause);
  }
}

/**
 * Any other HTTP failure, or errors reported in a GraphQL `errors` array.
 */
export class GitHubAPIError extends GitHubClientError {
  public readonly code = "GITHUB_API_ERROR" as const;
  public readonly statusCode: number;
  public readonly statusText?: string;

  constructor(message: string, statusCode: number, statusText?: string, retryable: boolean = false, cause?: unknown) {
    super(message, retryable, cause);
    this.statusCode = statusCode;
    this.statusText = statusText;
  }
}

/**
 * A response body did not have the expected shape.
 */
export class GitHubResponseError extends GitHubClientError {
  public readonly code = "GITHUB_RESPONSE_ERROR" as const;
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, false, cause);
    this.issues = issues;
  }
}

/**
 * Lister configuration failed validation.
 */
export class GitHubValidationError extends GitHubClientError {
  public readonly code = "GITHUB_VALIDATION_ERROR" as const;
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, false);
    this.validationErrors = validationErrors;
  }
}

export function isRetryableGitHubError(error: unknown): boolean {
  return error instanceof GitHubClientError && error.retryable;
}

/**
 * HTTP status codes that indicate a transient server-side condition.
 */
export function isRetryableStatusCode(statusCode: number): boolean {
  return [408, 429, 500, 502, 503, 504].includes(statusCode);
}
