import * as os from "os";

export type ReleaseFn = () => void;

const MAX_DEFAULT_CONCURRENCY = 8;

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(MAX_DEFAULT_CONCURRENCY, os.availableParallelism()));
}

/**
 * Counting semaphore. `acquire()` resolves with a release function once a
 * permit is free; waiters are served in FIFO order.
 */
export class Semaphore {
  private inUse = 0;
  private readonly waiters: Array<(release: ReleaseFn) => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new Error(`Semaphore capacity must be > 0 (got ${capacity})`);
    }
  }

  acquire(): Promise<ReleaseFn> {
    if (this.inUse < this.capacity) {
      this.inUse++;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.releasePermit();
    };
  }

  private releasePermit(): void {
    const next = this.waiters.shift();
    if (next) {
      // hand the permit straight to the next waiter
      next(this.createRelease());
      return;
    }
    this.inUse = Math.max(0, this.inUse - 1);
  }
}

/** Process-wide lock shared by every mutating operation. */
export const mutationLock = new Semaphore(1);

/**
 * Map `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  return results;
}
