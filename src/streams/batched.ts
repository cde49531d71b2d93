/**
 * Batching operator.
 *
 * @module streams/batched
 */

import type pino from "pino";
import { channelStream, type ChannelStream } from "./channel-stream.js";
import { InvalidBatchSizeError } from "./errors.js";

/**
 * Group `source` into arrays of exactly `size` items; the last group holds the
 * remainder. An empty source yields no groups.
 *
 * A source error is forwarded as the terminal error and the partial group
 * collected so far is dropped. Cancelling the result stops pulling from the source.
 *
 * @throws InvalidBatchSizeError if `size` is not a positive integer
 */
export function batched<T>(
  source: AsyncIterable<T>,
  size: number,
  options: { logger?: pino.Logger; name?: string } = {}
): ChannelStream<T[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidBatchSizeError(size);
  }

  return channelStream<T[]>(
    async (tx) => {
      let batch: T[] = [];
      for await (const item of source) {
        // Leaving the loop returns the source iterator
        if (tx.signal.aborted) {
          return;
        }
        batch.push(item);
        if (batch.length === size) {
          const full = batch;
          batch = [];
          await tx.send(full);
        }
      }
      if (batch.length > 0 && !tx.signal.aborted) {
        await tx.send(batch);
      }
    },
    { capacity: 1, name: options.name ?? "batched", logger: options.logger }
  );
}
