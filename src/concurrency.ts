/**
 * Mutual exclusion for async code.
 *
 * The request/reply client shares one connection between callers; a request
 * and its reply must not interleave with another caller's, so calls are
 * serialized through a {@link Mutex}.
 */

/**
 * FIFO async mutex.
 */
export class Mutex {
  private locked = false;
  private readonly waitQueue: Array<() => void> = [];

  /**
   * Acquires the lock, waiting behind earlier callers.
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(() => resolve());
    });
  }

  /**
   * Releases the lock, handing it directly to the next waiter if any.
   */
  release(): void {
    if (!this.locked) {
      throw new Error("Cannot release unlocked mutex");
    }

    const next = this.waitQueue.shift();
    if (next) {
      // Ownership passes to the waiter without unlocking in between
      process.nextTick(next);
    } else {
      this.locked = false;
    }
  }

  /**
   * Runs `fn` while holding the lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Whether the lock is currently held. */
  isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get waiting(): number {
    return this.waitQueue.length;
  }
}
