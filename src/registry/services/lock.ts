/**
 * Keyed async mutex. Callers holding the same key run one after another,
 * in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
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
   * Acquire several keys in the given order.
   */
  async runAll<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    if (keys.length === 0) return fn();
    const [first, ...rest] = keys;
    return this.run(first, () => this.runAll(rest, fn));
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
