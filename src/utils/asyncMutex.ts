/**
 * AsyncMutex - in-process mutual exclusion for async critical sections
 *
 * Callers queue behind the tail promise; the critical section always releases,
 * even when it throws.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `critical` once every earlier holder has finished
   */
  async runExclusive<T>(critical: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => released);
    this.pending++;

    await previous;
    try {
      return await critical();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * Number of holders plus waiters (for monitoring)
   */
  get queueLength(): number {
    return this.pending;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
