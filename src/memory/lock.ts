/**
 * Per-session critical section. Operations run one at a time in arrival order;
 * each waits on the tail of the queue before it starts.
 */

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Operations running or queued. */
  get depth(): number {
    return this.pending;
  }

  get busy(): boolean {
    return this.pending > 0;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Wait for the lock and return its release function. For critical sections that do not fit
   * a single callback (streaming); the caller must release exactly once.
   */
  async acquire(): Promise<() => void> {
    const previousTail = this.tail;
    let release = (): void => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previousTail.then(() => currentGate);
    this.pending++;

    await previousTail;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.pending--;
      release();
    };
  }
}
