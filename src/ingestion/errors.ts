/**
 * Document source error classes.
 *
 * Domain-specific errors for walking, reading, cloning and filtering. All errors
 * include an error code for categorization and support cause chaining.
 *
 * @module ingestion/errors
 */

/**
 * Base error class for document source operations.
 */
export class SourceError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;
  public readonly retryable: boolean;

  constructor(message: string, code: string = "SOURCE_ERROR", cause?: Error, retryable: boolean = false) {
    super(message);
    this.name = "SourceError";
    this.code = code;
    this.cause = cause;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid source configuration: empty identifiers, bad paths, unsupported URLs.
 */
export class ValidationError extends SourceError {
  public readonly field: string;

  constructor(message: string, field: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * An include or exclude pattern failed to compile.
 */
export class PatternError extends SourceError {
  public readonly pattern: string;
  public readonly list: "include" | "exclude";

  constructor(pattern: string, list: "include" | "exclude", cause?: Error) {
    super(
      `Invalid ${list} pattern '${pattern}'${cause ? `: ${cause.message}` : ""}`,
      "PATTERN_ERROR",
      cause
    );
    this.name = "PatternError";
    this.pattern = pattern;
    this.list = list;
  }
}

/**
 * Walking a root directory failed (missing root, permission denied, I/O error).
 */
export class FileScanError extends SourceError {
  public readonly root: string;

  constructor(message: string, root: string, cause?: Error) {
    super(message, "FILE_SCAN_ERROR", cause);
    this.name = "FileScanError";
    this.root = root;
  }
}

/**
 * Reading an accepted file failed.
 */
export class FileReadError extends SourceError {
  public readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Failed to read file '${path}'${cause ? `: ${cause.message}` : ""}`, "FILE_READ_ERROR", cause);
    this.name = "FileReadError";
    this.path = path;
  }
}

/**
 * git clone failed.
 */
export class CloneError extends SourceError {
  public readonly url: string;
  public readonly targetPath?: string;

  constructor(message: string, url: string, targetPath?: string, cause?: Error, retryable: boolean = false) {
    super(message, "CLONE_ERROR", cause, retryable);
    this.name = "CloneError";
    this.url = url;
    this.targetPath = targetPath;
  }
}

/**
 * Network failure during clone (DNS, connection refused or reset, timeout).
 *
 * Flagged retryable; the git source itself does not retry clones.
 */
export class NetworkError extends CloneError {
  constructor(message: string, url: string, targetPath?: string, cause?: Error) {
    super(message, url, targetPath, cause, true);
    this.name = "NetworkError";
  }
}

/**
 * Authentication failed or the repository is not visible with the given credentials.
 */
export class AuthenticationError extends SourceError {
  public readonly url: string;

  constructor(message: string, url: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", cause);
    this.name = "AuthenticationError";
    this.url = url;
  }
}

/**
 * A repository could not be cloned while processing a git source.
 */
export class RepositoryCloneError extends SourceError {
  public readonly repository: string;

  constructor(repository: string, cause?: Error) {
    super(
      `Error while cloning repository '${repository}'${cause ? `: ${cause.message}` : ""}`,
      "REPOSITORY_CLONE_ERROR",
      cause
    );
    this.name = "RepositoryCloneError";
    this.repository = repository;
  }
}

/**
 * Read the errno code (`ENOENT`, `EACCES`, ...) from a Node.js system error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Normalise a caught value into an Error.
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Check if a clone error is worth retrying.
 */
export function isRetryableCloneError(error: unknown): boolean {
  return error instanceof SourceError && error.retryable;
}
