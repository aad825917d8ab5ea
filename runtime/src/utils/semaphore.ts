/**
 * Counting semaphore for bounding concurrent async work.
 *
 * @module
 */

/**
 * `acquire()` resolves with a release function once a permit is free.
 * Waiters are served in FIFO order. Releasing twice is a no-op.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits -= 1;
      return this.createRelease();
    }
    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(this.createRelease()));
    });
  }

  /** Run `fn` while holding a permit. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter.
        next();
      } else {
        this.permits += 1;
      }
    };
  }
}
