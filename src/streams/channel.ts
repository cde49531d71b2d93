/**
 * Bounded multi-producer, single-consumer async channel.
 *
 * @module streams/channel
 */

import { ChannelClosedError, InvalidCapacityError } from "./errors.js";

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * FIFO queue holding at most `capacity` values.
 *
 * Senders wait while the buffer is full. The sending side ends the sequence with
 * `close(error?)`; buffered values are delivered first, then the error (once).
 * The receiving side drops the channel with `cancel()`, which fails every pending
 * and future `send` with {@link ChannelClosedError} and aborts {@link signal}.
 */
export class Channel<T> implements AsyncIterable<T> {
  readonly capacity: number;

  // Boxed so that an empty slot is distinguishable from an undefined value
  private readonly buffer: Array<{ value: T }> = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private readonly abortController = new AbortController();

  private closedFlag = false;
  private terminalError: Error | undefined;

  constructor(capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidCapacityError(capacity);
    }
    this.capacity = capacity;
  }

  /** Aborted once the receiver cancels */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  /** Number of buffered values */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Buffer a value, waiting while the channel is full.
   *
   * @throws ChannelClosedError if the receiver cancelled or the channel was closed
   */
  send(value: T): Promise<void> {
    if (this.cancelled) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.closedFlag) {
      return Promise.reject(new ChannelClosedError("Channel closed: send after close"));
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Pull the next value. Rejects once with the terminal error, if any, after
   * every buffered value has been delivered.
   */
  next(): Promise<IteratorResult<T>> {
    const slot = this.buffer.shift();
    if (slot) {
      const waiting = this.senders.shift();
      if (waiting) {
        this.buffer.push({ value: waiting.value });
        waiting.resolve();
      }
      return Promise.resolve({ value: slot.value, done: false });
    }

    if (this.closedFlag || this.cancelled) {
      return this.finish();
    }

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Sender side: no more values. An error becomes the consumer's terminal error.
   */
  close(error?: Error): void {
    if (this.closedFlag || this.cancelled) {
      return;
    }
    this.closedFlag = true;
    this.terminalError = error;

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError("Channel closed: send after close"));
    }

    // Receivers only wait on an empty buffer
    for (const receiver of this.receivers.splice(0)) {
      const error = this.takeTerminalError();
      if (error) {
        receiver.reject(error);
      } else {
        receiver.resolve({ value: undefined, done: true });
      }
    }
  }

  /**
   * Receiver side: drop the channel and discard buffered values.
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.buffer.length = 0;
    this.abortController.abort();

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.cancel();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private finish(): Promise<IteratorResult<T>> {
    const error = this.takeTerminalError();
    if (error) {
      return Promise.reject(error);
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  private takeTerminalError(): Error | undefined {
    const error = this.terminalError;
    this.terminalError = undefined;
    return error;
  }
}
