/**
 * Promise-chain mutual exclusion
 * Callers run one at a time in arrival order
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every earlier holder has released
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
