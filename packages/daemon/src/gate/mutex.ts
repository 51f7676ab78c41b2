/** FIFO async lock. Callers run one at a time in the order they asked. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
