/**
 * Async locking for shared client state.
 *
 * - AsyncMutex: single-resource exclusive lock
 * - KeyedMutex: one AsyncMutex per key (e.g. per device id), created on
 *   demand and dropped once nobody holds or waits for it
 */

/**
 * AsyncMutex — Exclusive lock for async operations.
 * Only one holder at a time; others queue in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Try to acquire the lock without waiting.
   * Returns release function if acquired, null if lock is held.
   */
  tryAcquire(): (() => void) | null {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }
    return null;
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand over in a microtask to avoid deep recursion
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * KeyedMutex — Serializes work per key while letting different keys proceed
 * concurrently.
 */
export class KeyedMutex {
  private locks: Map<string, AsyncMutex> = new Map();
  private pending: Map<string, number> = new Map();

  async withLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.locks.set(key, mutex);
    }
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1);

    try {
      return await mutex.withLock(fn);
    } finally {
      const remaining = (this.pending.get(key) ?? 1) - 1;
      if (remaining <= 0) {
        this.pending.delete(key);
        this.locks.delete(key);
      } else {
        this.pending.set(key, remaining);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked ?? false;
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.locks.size;
  }
}
