/**
 * Simple in-process mutex for serializing async operations.
 */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every previously queued call has settled.
   * A rejection from `fn` reaches the caller and does not block the queue.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const tail = this.queue;
    let release = (): void => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await tail;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
