/**
 * Counting semaphore bounding in-flight oracle calls, rule evaluations and
 * tool invocations. Waiters are served first come, first served; a released
 * permit passes straight to the next waiter.
 */
export class Semaphore {
  private available: number;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Semaphore limit must be a positive integer (got ${limit})`);
    }
    this.available = limit;
  }

  get inFlight(): number {
    return this.limit - this.available;
  }

  get queued(): number {
    return this.waiting.length;
  }

  /** Resolves with a release function; calling it more than once is a no-op */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiting.shift();
      if (next) next();
      else this.available++;
    };
  }

  async run<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }
}
