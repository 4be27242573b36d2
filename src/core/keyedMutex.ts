/**
 * KeyedMutex serializes work per key, FIFO in arrival order.
 *
 * Work under different keys runs independently. Each key holds the tail of a
 * promise chain; the entry is dropped once the last queued task settles so
 * idle keys do not accumulate.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
