/**
 * Unit tests for retry utility
 */

import { describe, test, expect, vi } from "vitest";
import {
  withRetry,
  defaultExponentialBackoff,
  createExponentialBackoff,
} from "../../../src/utils/retry.js";

const noSleep = (): Promise<void> => Promise.resolve();

class HintedError extends Error {
  constructor(readonly retryAfterMs: number) {
    super("rate limited");
  }
}

describe("defaultExponentialBackoff", () => {
  test("doubles from one second", () => {
    expect(defaultExponentialBackoff(0)).toBe(1000);
    expect(defaultExponentialBackoff(1)).toBe(2000);
    expect(defaultExponentialBackoff(3)).toBe(8000);
  });
});

describe("withRetry", () => {
  test("returns result on first attempt", async () => {
    const operation = vi.fn(() => Promise.resolve("ok"));

    await expect(withRetry(operation, { maxRetries: 3, sleep: noSleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("succeeds after transient failures", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      if (attempts < 3) throw new Error(`failure ${attempts}`);
      return "recovered";
    });

    await expect(withRetry(operation, { maxRetries: 3, sleep: noSleep })).resolves.toBe("recovered");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("throws the last error once retries are exhausted", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      throw new Error(`failure ${attempts}`);
    });

    await expect(withRetry(operation, { maxRetries: 2, sleep: noSleep })).rejects.toThrow("failure 3");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("does not retry errors rejected by shouldRetry", async () => {
    const operation = vi.fn(() => Promise.reject(new Error("fatal")));

    await expect(
      withRetry(operation, { maxRetries: 5, shouldRetry: () => false, sleep: noSleep })
    ).rejects.toThrow("fatal");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("wraps non-Error rejections", async () => {
    const operation = (): Promise<never> => Promise.reject("plain string");

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("plain string");
  });

  test("passes computed delays to onRetry and sleep", async () => {
    const delays: number[] = [];
    const onRetry = vi.fn();
    const operation = vi.fn(() => Promise.reject(new Error("down")));

    await expect(
      withRetry(operation, {
        maxRetries: 2,
        calculateBackoff: (attempt) => (attempt + 1) * 10,
        onRetry,
        sleep: (ms) => {
          delays.push(ms);
          return Promise.resolve();
        },
      })
    ).rejects.toThrow("down");

    expect(delays).toEqual([10, 20]);
    expect(onRetry).toHaveBeenNthCalledWith(1, 0, expect.any(Error), 10);
    expect(onRetry).toHaveBeenNthCalledWith(2, 1, expect.any(Error), 20);
  });
});

describe("createExponentialBackoff", () => {
  const backoff = createExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 3 });

  test("grows by the multiplier and caps at the maximum", () => {
    expect(backoff(0, new Error("x"))).toBe(100);
    expect(backoff(1, new Error("x"))).toBe(300);
    expect(backoff(2, new Error("x"))).toBe(900);
    expect(backoff(3, new Error("x"))).toBe(1000);
  });

  test("honours a longer retry-after hint", () => {
    expect(backoff(0, new HintedError(500))).toBe(500);
    expect(backoff(0, new HintedError(50))).toBe(100);
    expect(backoff(0, new HintedError(5000))).toBe(1000);
  });
});
