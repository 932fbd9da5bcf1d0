/** Serializes async sections in arrival order. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      release();
    }
  }
}
