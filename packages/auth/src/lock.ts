/**
 * Awaitable mutual exclusion built on a promise chain.
 *
 * Each caller waits on the previous holder's promise and installs its own, so
 * waiters suspend instead of polling and are served in arrival order.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every earlier holder has finished. The lock is released
   * however `task` settles.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;

    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      release();
    }
  }
}
