/**
 * Per-application mutual exclusion. Operations on the same key run one after another,
 * different keys run concurrently.
 */
export class AppLocks {
  private locks = new Map<string, Promise<void>>();

  async withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      // Drop the entry unless another caller queued up behind us
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
