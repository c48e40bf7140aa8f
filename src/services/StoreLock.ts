/**
 * StoreLock - FIFO async mutex around report/stats/ban read-modify-write sequences
 * Holders queue in call order; a throwing holder still releases
 */
export class StoreLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    this.holders += 1;
    try {
      return await fn();
    } finally {
      this.holders -= 1;
      release();
    }
  }

  isLocked(): boolean {
    return this.holders > 0;
  }
}
