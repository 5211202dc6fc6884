/**
 * Async primitive tests
 */

import { describe, it, expect, vi } from "vitest";
import { KeyedMutex, Mutex, Semaphore, mapConcurrent, retry, sleep, withDeadline } from "../async.js";

describe("withDeadline", () => {
  it("should resolve with the work's value when it finishes in time", async () => {
    const value = await withDeadline(async () => "done", 1000, () => new Error("late"));
    expect(value).toBe("done");
  });

  it("should reject with the expiry error and abort the signal", async () => {
    let seen: AbortSignal | undefined;
    const work = withDeadline(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      },
      20,
      () => new Error("deadline passed")
    );

    await expect(work).rejects.toThrow("deadline passed");
    expect(seen?.aborted).toBe(true);
  });

  it("should run without a timer when the deadline is infinite", async () => {
    const value = await withDeadline(async (signal) => signal.aborted, Number.POSITIVE_INFINITY, () => new Error("x"));
    expect(value).toBe(false);
  });
});

describe("Mutex", () => {
  it("should serialize critical sections in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive(async () => {
        order.push("a:start");
        await sleep(10);
        order.push("a:end");
      }),
      mutex.runExclusive(async () => {
        order.push("b:start");
        order.push("b:end");
      }),
    ]);

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.locked).toBe(false);
  });
});

describe("KeyedMutex", () => {
  it("should lock keys independently", () => {
    const locks = new KeyedMutex();

    expect(locks.tryAcquire("a")).toBe(true);
    expect(locks.tryAcquire("a")).toBe(false);
    expect(locks.tryAcquire("b")).toBe(true);
    expect(locks.isLocked("a")).toBe(true);
  });

  it("should hand a released key to the first waiter", async () => {
    const locks = new KeyedMutex();
    locks.tryAcquire("a");

    const first = locks.acquire("a");
    const second = locks.acquire("a");
    expect(locks.waiting("a")).toBe(2);

    locks.release("a");
    expect(await first).toBe(true);
    expect(locks.waiting("a")).toBe(1);

    locks.release("a");
    expect(await second).toBe(true);

    locks.release("a");
    expect(locks.isLocked("a")).toBe(false);
  });

  it("should give up after the wait timeout and leave the queue clean", async () => {
    const locks = new KeyedMutex();
    locks.tryAcquire("a");

    expect(await locks.acquire("a", 10)).toBe(false);
    expect(locks.waiting("a")).toBe(0);
    expect(locks.isLocked("a")).toBe(true);
  });

  it("should release the key when the exclusive section throws", async () => {
    const locks = new KeyedMutex();

    await expect(
      locks.runExclusive("a", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(locks.isLocked("a")).toBe(false);
  });
});

describe("Semaphore", () => {
  it("should reject a non-positive capacity", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it("should bound the number of concurrent holders", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });
});

describe("retry", () => {
  it("should retry until success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");

    const result = await retry(fn, { maxAttempts: 3, initialDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should stop at maxAttempts and rethrow the last error", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("down"));
    const onRetry = vi.fn();

    await expect(retry(fn, { maxAttempts: 3, initialDelayMs: 1, onRetry })).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("should not retry errors the predicate rejects", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"));

    await expect(retry(fn, { maxAttempts: 5, initialDelayMs: 1, retryIf: () => false })).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should stop once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error("aborted");
    });

    await expect(retry(fn, { maxAttempts: 5, initialDelayMs: 1, signal: controller.signal })).rejects.toThrow(
      "aborted"
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("mapConcurrent", () => {
  it("should keep results in input order", async () => {
    const results = await mapConcurrent(
      [30, 10, 20],
      async (ms, index) => {
        await sleep(ms);
        return index;
      },
      3
    );

    expect(results).toEqual([0, 1, 2]);
  });

  it("should return an empty array for no items", async () => {
    expect(await mapConcurrent([], async () => 1, 4)).toEqual([]);
  });
});
