/**
 * Keyed Mutex
 *
 * One FIFO lock per key. Locks for distinct keys never wait on each other.
 *
 * @module policy/mutex
 */

class Lock {
  private locked = false;
  private readonly waiting: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  get idle(): boolean {
    return !this.locked && this.waiting.length === 0;
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, Lock>();

  /**
   * Run `task` while holding the lock for `key`.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Lock();
      this.locks.set(key, lock);
    }

    await lock.acquire();
    try {
      return await task();
    } finally {
      lock.release();
      if (lock.idle) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys currently held or awaited.
   */
  get size(): number {
    return this.locks.size;
  }
}

/**
 * Process-wide lock set for bucket policy updates.
 */
export const sharedPolicyLocks = new KeyedMutex();
