/**
 * Unit tests for the batching operator
 */

import { describe, test, expect } from "vitest";
import { batched } from "../../../src/streams/batched.js";
import { channelStream } from "../../../src/streams/channel-stream.js";
import { InvalidBatchSizeError } from "../../../src/streams/errors.js";
import { drain, failingAfter, fromArray } from "../../helpers/streams.js";

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

describe("batched", () => {
  test("should group items and flush the remainder", async () => {
    const groups = await batched(fromArray(range(12)), 5).collect();

    expect(groups).toEqual([
      [0, 1, 2, 3, 4],
      [5, 6, 7, 8, 9],
      [10, 11],
    ]);
  });

  test("should emit only full groups when the count divides evenly", async () => {
    const groups = await batched(fromArray(range(10)), 5).collect();

    expect(groups.map((group) => group.length)).toEqual([5, 5]);
  });

  test("should emit nothing for an empty source", async () => {
    await expect(batched(fromArray<number>([]), 3).collect()).resolves.toEqual([]);
  });

  test("should emit singletons with size 1", async () => {
    await expect(batched(fromArray(["a", "b"]), 1).collect()).resolves.toEqual([["a"], ["b"]]);
  });

  test.each([0, -1, 2.5, Number.NaN])("should reject batch size %s", (size) => {
    expect(() => batched(fromArray([1]), size)).toThrow(InvalidBatchSizeError);
  });

  test("should forward a source error without flushing the partial group", async () => {
    const failure = new Error("read failed");

    const { items, error } = await drain(batched(failingAfter(range(7), failure), 5));

    expect(items).toEqual([[0, 1, 2, 3, 4]]);
    expect(error).toBe(failure);
  });

  test("should forward a channel stream's terminal error", async () => {
    const upstream = channelStream<number>(async (tx) => {
      await tx.send(1);
      await tx.send(2);
      throw new Error("upstream broke");
    });

    const { items, error } = await drain(batched(upstream, 10));

    expect(items).toEqual([]);
    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty("message", "upstream broke");
  });

  test("should stop pulling from the source once cancelled", async () => {
    let finalized = false;
    async function* naturals(): AsyncGenerator<number> {
      try {
        for (let i = 0; ; i++) {
          yield i;
        }
      } finally {
        finalized = true;
      }
    }

    const stream = batched(naturals(), 5);
    for await (const group of stream) {
      expect(group).toEqual([0, 1, 2, 3, 4]);
      break;
    }
    await stream.completed;

    expect(finalized).toBe(true);
  });

  test("should not pull past the item in flight when cancelled", async () => {
    let pulled = 0;
    let finalized = false;
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    async function* slow(): AsyncGenerator<number> {
      try {
        for (let i = 0; i < 20; i++) {
          if (i === 5) {
            await gate;
          }
          pulled++;
          yield i;
        }
      } finally {
        finalized = true;
      }
    }

    const stream = batched(slow(), 5);
    for await (const group of stream) {
      expect(group).toEqual([0, 1, 2, 3, 4]);
      break;
    }
    const pulledAtCancel = pulled;
    release();
    await stream.completed;

    expect(pulledAtCancel).toBe(5);
    expect(pulled).toBe(6);
    expect(finalized).toBe(true);
  });
});
