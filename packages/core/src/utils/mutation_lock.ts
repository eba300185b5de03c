/**
 * Exclusive FIFO lock over async critical sections.
 *
 * Each caller waits for the previous holder to settle, whether it resolved
 * or rejected.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(critical: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await critical();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Number of callers holding or waiting for the lock. */
  get size(): number {
    return this.pending;
  }
}
