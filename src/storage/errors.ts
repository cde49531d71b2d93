/**
 * Error classes for the search engine
 *
 * Every failure of the index engine surfaces as a StorageError subclass so that
 * callers can tell query mistakes apart from write or read failures.
 */

/**
 * Base error class for all storage-related errors
 */
export class StorageError extends Error {
  /**
   * Error code for categorization and handling
   */
  public readonly code: string;

  /**
   * Original error that caused this error (if any)
   *
   * NOTE: Uses 'override' to narrow ES2022 Error.cause to Error instances.
   */
  public override readonly cause?: Error;

  /**
   * Whether this error is transient and the operation should be retried
   */
  public readonly retryable: boolean;

  constructor(message: string, code: string = "STORAGE_ERROR", cause?: Error, retryable: boolean = false) {
    super(message);
    this.name = "StorageError";
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
 * Thrown when the index cannot be opened or created
 */
export class StorageOpenError extends StorageError {
  public readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Failed to open search index at '${path}'${cause ? `: ${cause.message}` : ""}`, "OPEN_ERROR", cause);
    this.name = "StorageOpenError";
    this.path = path;
  }
}

/**
 * Thrown for operations on an engine that has been closed
 */
export class EngineClosedError extends StorageError {
  constructor(operation: string) {
    super(`Cannot ${operation}: search engine is closed`, "ENGINE_CLOSED");
    this.name = "EngineClosedError";
  }
}

/**
 * Thrown when a document in a batch cannot be indexed as given
 *
 * @example
 * ```typescript
 * try {
 *   await engine.index([{ id: "", source: "notes", title: "", link: "", content: "", metadata: {} }]);
 * } catch (error) {
 *   if (error instanceof InvalidDocumentError) {
 *     console.error(`Rejected field ${error.field}`);
 *   }
 * }
 * ```
 */
export class InvalidDocumentError extends StorageError {
  /**
   * The document field that was invalid
   */
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, "INVALID_DOCUMENT");
    this.name = "InvalidDocumentError";
    this.field = field;
  }
}

/**
 * Thrown when a batch could not be written or committed
 *
 * The batch's transaction has been rolled back; nothing from it is visible.
 */
export class IndexWriteError extends StorageError {
  /**
   * Number of documents in the rejected batch
   */
  public readonly batchSize: number;

  constructor(message: string, batchSize: number, cause?: Error, retryable: boolean = false) {
    super(message, "INDEX_WRITE_ERROR", cause, retryable);
    this.name = "IndexWriteError";
    this.batchSize = batchSize;
  }
}

/**
 * Thrown when a query string cannot be parsed by the full-text engine
 */
export class QueryParseError extends StorageError {
  public readonly query: string;

  constructor(query: string, message: string, cause?: Error) {
    super(message, "QUERY_PARSE_ERROR", cause);
    this.name = "QueryParseError";
    this.query = query;
  }
}

/**
 * Thrown when a search could not be completed for reasons other than the query
 */
export class SearchOperationError extends StorageError {
  constructor(message: string, cause?: Error, retryable: boolean = false) {
    super(message, "SEARCH_OPERATION_ERROR", cause, retryable);
    this.name = "SearchOperationError";
  }
}

/**
 * SQLite result codes for lock contention, which clear up on their own
 */
const RETRYABLE_SQLITE_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED"];

/**
 * Determine if an error is retryable based on its type and characteristics
 */
export function isRetryableStorageError(error: unknown): boolean {
  if (error instanceof StorageError) {
    return error.retryable;
  }

  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    const sqliteCode = error.code;
    return RETRYABLE_SQLITE_CODES.some((code) => sqliteCode === code || sqliteCode.startsWith(`${code}_`));
  }

  return false;
}
