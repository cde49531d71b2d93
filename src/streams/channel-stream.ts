/**
 * Channel stream bridge.
 *
 * Turns a producer task that pushes values into a sender into an async sequence
 * the consumer pulls from. The producer runs concurrently with the consumer and
 * is held back by the bounded channel.
 *
 * @module streams/channel-stream
 */

import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { Channel } from "./channel.js";
import { ChannelClosedError, ProducerPanicError } from "./errors.js";

/**
 * Sending half handed to a producer.
 */
export interface Sender<T> {
  /**
   * Buffer a value; waits while the channel is full.
   * Rejects with ChannelClosedError once the consumer has gone away.
   */
  send(value: T): Promise<void>;

  /** Aborted when the consumer cancels */
  readonly signal: AbortSignal;
}

/**
 * Producer task body. Its rejection becomes the stream's terminal error.
 */
export type Producer<T> = (sender: Sender<T>) => Promise<void>;

export interface ChannelStreamOptions {
  /**
   * Channel capacity
   * @default 1
   */
  capacity?: number;

  /** Name used in logs and panic messages */
  name?: string;

  logger?: pino.Logger;
}

/**
 * Consumer half of a channel stream.
 *
 * Iterating yields every value the producer sent, in order, then rejects once
 * with the producer's error if it failed. Breaking out of a `for await` loop
 * cancels the stream.
 */
export class ChannelStream<T> implements AsyncIterable<T> {
  constructor(
    private readonly channel: Channel<T>,
    /** Settles (never rejects) when the producer task has ended */
    readonly completed: Promise<void>
  ) {}

  /**
   * Stop consuming: buffered values are dropped and the producer's next send fails.
   */
  cancel(): void {
    this.channel.cancel();
  }

  get cancelled(): boolean {
    return this.channel.cancelled;
  }

  /**
   * Drain the stream into an array. Rejects with the terminal error, if any.
   */
  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.channel[Symbol.asyncIterator]();
  }
}

/**
 * Normalise whatever a producer threw into the stream's terminal error.
 */
export function toProducerError(thrown: unknown, name?: string): Error {
  return thrown instanceof Error ? thrown : new ProducerPanicError(thrown, name);
}

/**
 * Start `producer` as an independent task and return the consuming stream.
 *
 * The producer begins on the next microtask. Every value it sends is delivered in
 * order; if it rejects, the consumer receives exactly one terminal error after
 * those values.
 *
 * @example
 * ```typescript
 * const numbers = channelStream<number>(async (tx) => {
 *   for (let i = 0; i < 3; i++) await tx.send(i);
 * });
 * for await (const n of numbers) console.log(n);
 * ```
 */
export function channelStream<T>(producer: Producer<T>, options: ChannelStreamOptions = {}): ChannelStream<T> {
  const channel = new Channel<T>(options.capacity ?? 1);
  const name = options.name ?? "anonymous";
  const logger = options.logger ?? getComponentLogger("streams:channel");

  const sender: Sender<T> = {
    send: (value: T) => channel.send(value),
    signal: channel.signal,
  };

  const completed = Promise.resolve()
    .then(() => producer(sender))
    .then(
      () => {
        channel.close();
      },
      (thrown: unknown) => {
        if (thrown instanceof ChannelClosedError && channel.cancelled) {
          logger.debug({ stream: name }, "Producer stopped after consumer cancelled");
          return;
        }
        const error = toProducerError(thrown, name);
        logger.debug({ stream: name, err: error }, "Producer failed, forwarding error to consumer");
        channel.close(error);
      }
    );

  return new ChannelStream(channel, completed);
}
