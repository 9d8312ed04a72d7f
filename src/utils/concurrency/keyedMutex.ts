/**
 * Keyed async mutex
 *
 * Serializes critical sections that share any key. A section holding
 * several keys takes them in sorted order, so two sections can never wait
 * on each other.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` while holding every key in `keys`
   */
  async runExclusive<T>(keys: Iterable<string>, task: () => Promise<T> | T): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of sorted) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /**
   * Number of keys with a holder or waiters
   */
  get size(): number {
    return this.tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
