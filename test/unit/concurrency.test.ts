import { describe, test, expect } from "vitest";
import { Semaphore, defaultConcurrency, mapWithConcurrency } from "../../src/utils/concurrency";

function tick(ms = 1): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("Semaphore", () => {
  test("should reject a capacity below one", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore capacity must be > 0 (got 0)");
  });

  test("should serve waiters in arrival order", async () => {
    const lock = new Semaphore(1);
    const order: string[] = [];

    const release = await lock.acquire();
    const first = lock.run(async () => {
      order.push("first");
    });
    const second = lock.run(async () => {
      order.push("second");
    });
    await tick();
    expect(order).toEqual([]);

    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  test("should release the permit when a task fails", async () => {
    const lock = new Semaphore(1);

    await expect(lock.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run(async () => "next")).resolves.toBe("next");
  });

  test("releasing twice frees only one permit", async () => {
    const lock = new Semaphore(1);
    const release = await lock.acquire();
    release();
    release();

    const held = await lock.acquire();
    let acquired = false;
    const waiting = lock.acquire().then((next) => {
      acquired = true;
      next();
    });
    await tick();
    expect(acquired).toBe(false);

    held();
    await waiting;
    expect(acquired).toBe(true);
  });
});

describe("mapWithConcurrency", () => {
  test("should keep input order whatever the completion order", async () => {
    const results = await mapWithConcurrency([30, 1, 15, 5], 4, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:1", "2:15", "3:5"]);
  });

  test("should cap the number of calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  test("should handle an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  test("defaultConcurrency stays between 1 and 8", () => {
    const value = defaultConcurrency();
    expect(value).toBeGreaterThanOrEqual(1);
    expect(value).toBeLessThanOrEqual(8);
  });
});
