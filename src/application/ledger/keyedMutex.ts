/**
 * Per-key mutual exclusion inside one process. Holders of a key run one at a
 * time in arrival order; different keys do not wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding every key. Keys are taken in sorted order so two
   * callers locking overlapping sets cannot deadlock.
   */
  async runExclusive<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of sorted) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chained = previous.then(() => current);
    this.tails.set(key, chained);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === chained) {
        this.tails.delete(key);
      }
    };
  }
}
