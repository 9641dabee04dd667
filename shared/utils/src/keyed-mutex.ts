/**
 * Serializes async sections per key inside one process.
 * Callers for different keys run concurrently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Hold several keys at once. Keys are sorted so two callers locking the
   * same set cannot deadlock.
   */
  public async runExclusiveAll<T>(
    keys: string[],
    fn: () => Promise<T>,
  ): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const run = (index: number): Promise<T> => {
      const key = ordered[index];
      if (key === undefined) return fn();
      return this.runExclusive(key, () => run(index + 1));
    };
    return run(0);
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
