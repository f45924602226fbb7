/**
 * Output Guard
 *
 * Promise-based mutex that serializes writes to a shared output sink.
 *
 * @module breakfast-scheduler/engine/output-guard
 */

/**
 * Mutual-exclusion wrapper around side-effecting actions.
 *
 * Each waiter chains onto the tail of the previous holder, so waiters are
 * served in arrival order. Not re-entrant: calling `withLock` from inside a
 * protected action deadlocks.
 *
 * @example
 * ```typescript
 * const guard = new OutputGuard();
 * await guard.withLock(() => sink.write('Creating coffee...'));
 * ```
 */
export class OutputGuard {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private acquisitionCount = 0;

  /**
   * Run `action` while holding the lock. The lock is released on every exit
   * path, including when `action` throws or rejects.
   */
  async withLock<T>(action: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await action();
    } finally {
      release();
    }
  }

  /**
   * Whether an action currently holds the lock
   */
  isLocked(): boolean {
    return this.held;
  }

  /**
   * Number of times the lock has been acquired
   */
  get acquisitions(): number {
    return this.acquisitionCount;
  }

  private async acquire(): Promise<() => void> {
    const previous = this.tail;

    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = () => {
        this.held = false;
        resolve();
      };
    });

    await previous;
    this.held = true;
    this.acquisitionCount++;
    return release;
  }
}
