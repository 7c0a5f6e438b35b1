type Release = () => void;

function compareKeys(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a).localeCompare(String(b));
}

/**
 * FIFO mutual exclusion per key.
 *
 * Each key keeps the tail of a promise chain; a new holder chains onto the tail
 * and runs once every earlier holder of the same key has released. Holders of
 * different keys never wait on each other. Keys with no pending holder are dropped.
 */
export class KeyedMutex<K extends string | number> {
  private readonly tails = new Map<K, Promise<void>>();

  /**
   * Number of keys that currently have a holder or waiters
   */
  get size(): number {
    return this.tails.size;
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  async runExclusive<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Hold several keys at once. Keys are taken in ascending order so two callers
   * asking for overlapping sets cannot deadlock.
   */
  async runExclusiveMany<T>(keys: readonly K[], fn: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort(compareKeys);
    const releases: Release[] = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  private async acquire(key: K): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseCurrent: Release = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseCurrent = () => resolve();
    });

    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      releaseCurrent();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
