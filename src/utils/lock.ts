/**
 * Lightweight in-process lock: operations sharing a key run one at a time.
 */
export class KeyedLock {
  private locks = new Map<string, Promise<void>>();

  async withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    // wait until no holder remains; a woken waiter can lose the race to another
    let current = this.locks.get(key);
    while (current) {
      await current;
      current = this.locks.get(key);
    }

    let releaseLock: () => void = () => undefined;
    const lockPromise = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    this.locks.set(key, lockPromise);

    try {
      return await operation();
    } finally {
      this.locks.delete(key);
      releaseLock();
    }
  }
}

export const indexLock = new KeyedLock();
