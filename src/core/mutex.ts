/**
 * Promise-chained mutual exclusion for async critical sections.
 *
 * Callers are admitted strictly in arrival order; a rejected section releases the lock
 * like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public async runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await section();
    } finally {
      release();
    }
  }
}
