/**
 * Counting semaphores
 *
 * `Semaphore` bounds how many holders run at once; waiters are served in
 * FIFO order. `KeyedSemaphore` lazily creates one semaphore per key with a
 * shared limit, which is how outbound probes are bounded per platform.
 * A `Semaphore` of one permit doubles as the registry's mutation lock.
 */

type Release = () => void;

export class Semaphore {
  private permits: number;
  private readonly waiters: Array<(release: Release) => void> = [];

  constructor(private readonly maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  /**
   * Wait for a permit. Resolves with a release function that must be called
   * exactly once; extra calls are ignored.
   */
  acquire(): Promise<Release> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding a permit.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Permits currently free */
  get available(): number {
    return this.permits;
  }

  /** Callers blocked in acquire() */
  get waiting(): number {
    return this.waiters.length;
  }

  get capacity(): number {
    return this.maxPermits;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter.
        next(this.createRelease());
      } else {
        this.permits++;
      }
    };
  }
}

export class KeyedSemaphore {
  private readonly semaphores: Map<string, Semaphore> = new Map();

  constructor(private readonly permitsPerKey: number) {}

  get(key: string): Semaphore {
    let semaphore = this.semaphores.get(key);
    if (!semaphore) {
      semaphore = new Semaphore(this.permitsPerKey);
      this.semaphores.set(key, semaphore);
    }
    return semaphore;
  }

  runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    return this.get(key).runExclusive(fn);
  }

  /**
   * Per-key usage, for diagnostics.
   */
  getStatus(): Array<{ key: string; inUse: number; waiting: number; limit: number }> {
    return Array.from(this.semaphores.entries()).map(([key, semaphore]) => ({
      key,
      inUse: semaphore.capacity - semaphore.available,
      waiting: semaphore.waiting,
      limit: semaphore.capacity,
    }));
  }
}
