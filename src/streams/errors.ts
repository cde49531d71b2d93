/**
 * Stream error classes.
 *
 * @module streams/errors
 */

/**
 * Base error class for stream plumbing failures.
 */
export class StreamError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string = "STREAM_ERROR", cause?: unknown) {
    super(message);
    this.name = "StreamError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Raised to a sender once the receiving side is gone (cancelled or closed).
 *
 * Producers should let it propagate; a producer that ends with this error after
 * the consumer cancelled is treated as a normal shutdown.
 */
export class ChannelClosedError extends StreamError {
  constructor(message: string = "Channel closed: receiver is no longer listening") {
    super(message, "CHANNEL_CLOSED");
    this.name = "ChannelClosedError";
  }
}

/**
 * Wraps a non-Error value thrown by a producer task.
 */
export class ProducerPanicError extends StreamError {
  public readonly thrown: unknown;

  constructor(thrown: unknown, streamName?: string) {
    super(
      `Producer${streamName ? ` '${streamName}'` : ""} failed abnormally: ${String(thrown)}`,
      "PRODUCER_PANIC"
    );
    this.name = "ProducerPanicError";
    this.thrown = thrown;
  }
}

/**
 * Batch size must be a positive integer.
 */
export class InvalidBatchSizeError extends StreamError {
  public readonly size: number;

  constructor(size: number) {
    super(`Batch size must be a positive integer, got ${size}`, "INVALID_BATCH_SIZE");
    this.name = "InvalidBatchSizeError";
    this.size = size;
  }
}

/**
 * Channel capacity must be a positive integer.
 */
export class InvalidCapacityError extends StreamError {
  constructor(capacity: number) {
    super(`Channel capacity must be a positive integer, got ${capacity}`, "INVALID_CAPACITY");
    this.name = "InvalidCapacityError";
  }
}
