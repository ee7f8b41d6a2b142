/**
 * Mutex
 *
 * FIFO async lock. Waiters are resumed strictly in the order they called
 * `acquire`, so savepoint numbers handed out under the lock follow call order.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex();
 *
 * const release = await mutex.acquire();
 * try {
 *   await performStatement();
 * } finally {
 *   release();
 * }
 * ```
 */

export type MutexRelease = () => void;

export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: MutexRelease) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<MutexRelease> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): MutexRelease {
    let released = false;

    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter; the lock never looks free in between.
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
