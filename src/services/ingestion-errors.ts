/**
 * Error classes for the IngestionService
 *
 * @module services/ingestion-errors
 */

import type { IngestionFailurePhase } from "./ingestion-types.js";

/**
 * Base error class for ingestion operations
 */
export class IngestionError extends Error {
  /**
   * Whether this error is retryable
   * True if the operation might succeed on retry
   */
  public readonly retryable: boolean;

  /**
   * Original error that caused this error (if any)
   */
  public override readonly cause?: unknown;

  constructor(message: string, retryable: boolean = false, cause?: unknown) {
    super(message);
    this.name = "IngestionError";
    this.retryable = retryable;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

function isRetryable(error: Error): boolean {
  return "retryable" in error && error.retryable === true;
}

/**
 * A source failed; the run was aborted.
 *
 * Wraps the underlying error with the id of the failing source and the phase
 * it failed in. `retryable` mirrors the cause.
 */
export class SourceIngestionError extends IngestionError {
  override name = "SourceIngestionError";
  public readonly sourceId: string;
  public readonly phase: IngestionFailurePhase;

  constructor(sourceId: string, phase: IngestionFailurePhase, cause: Error) {
    const action = phase === "fetch" ? "fetching documents from" : "indexing documents of";
    super(`Error while ${action} source '${sourceId}': ${cause.message}`, isRetryable(cause), cause);
    this.sourceId = sourceId;
    this.phase = phase;
  }
}

/**
 * A source produced a document attributed to another source
 */
export class SourceMismatchError extends IngestionError {
  override name = "SourceMismatchError";

  constructor(
    public readonly sourceId: string,
    public readonly documentId: string,
    public readonly documentSource: string
  ) {
    super(`Document '${documentId}' claims source '${documentSource}', expected '${sourceId}'`);
  }
}

/**
 * Two configured sources share an id
 */
export class DuplicateSourceError extends IngestionError {
  override name = "DuplicateSourceError";

  constructor(public readonly sourceId: string) {
    super(`Source id '${sourceId}' is used more than once`);
  }
}

/**
 * Error thrown when attempting to start a run while another is in progress
 */
export class IngestionInProgressError extends IngestionError {
  override name = "IngestionInProgressError";

  constructor() {
    super("Cannot start ingestion: another ingestion run is in progress", true);
  }
}

/**
 * The run was stopped through its abort signal
 */
export class IngestionCancelledError extends IngestionError {
  override name = "IngestionCancelledError";

  constructor(
    public readonly sourceId: string,
    public readonly documentsIndexed: number
  ) {
    super(`Ingestion cancelled while processing source '${sourceId}' after ${documentsIndexed} documents`);
  }
}
