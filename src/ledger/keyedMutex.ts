/**
 * In-process exclusive sections keyed by string. Callers on the same key run
 * one at a time in arrival order; different keys do not wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  get activeKeys(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
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
}
