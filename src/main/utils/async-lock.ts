/**
 * Async Lock - serializes access to a shared resource across await points
 */

/**
 * FIFO mutual-exclusion lock
 *
 * Waiters are queued in arrival order. `runExclusive` releases the lock even
 * when the critical section throws.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Wait for the lock and return its release function
   */
  async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
