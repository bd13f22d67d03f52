/**
 * Serialises asynchronous sections per key while letting distinct keys run
 * concurrently. The correlation registry keys it by correlation id so the
 * ordering buffer and state transitions of one invocation are only ever
 * mutated by a single writer at a time.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a running or queued section. */
  size(): number {
    return this.tails.size;
  }
}
