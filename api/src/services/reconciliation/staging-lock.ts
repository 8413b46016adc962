/**
 * FIFO mutual exclusion around the shared staging relation. Import, merge and
 * truncate of one upload run as a single critical section.
 */
export class StagingLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let releaseLock: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });

    this.waiting++;
    try {
      await previous;
      return await task();
    } finally {
      this.waiting--;
      releaseLock();
    }
  }

  /** Holders plus waiters */
  get pending(): number {
    return this.waiting;
  }
}
