/**
 * Promise-chain locks.
 *
 * `Mutex` serializes async critical sections in FIFO order.
 * `KeyedMutex` hands out one Mutex per key (worker name, group name) and
 * forgets idle keys so removed workers do not leak.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  /** Resolves with a release function once the lock is held. */
  acquire(): Promise<() => void> {
    this.holders += 1;
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => { release = resolve; });
    const prev = this.tail;
    this.tail = prev.then(() => next);

    let released = false;
    return prev.then(() => () => {
      if (released) return;
      released = true;
      this.holders -= 1;
      release();
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.locked ?? false;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const mutex = this.lockFor(key);
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.locked) this.locks.delete(key);
    }
  }

  /**
   * Holds every key for the duration of `fn`. Keys are taken in the order
   * given, so callers decide the ordering that keeps them deadlock-free.
   */
  async runExclusiveMany<T>(keys: readonly string[], fn: () => Promise<T> | T): Promise<T> {
    const unique = [...new Set(keys)];
    const held: Array<{ key: string; mutex: Mutex; release: () => void }> = [];
    try {
      for (const key of unique) {
        const mutex = this.lockFor(key);
        const release = await mutex.acquire();
        held.push({ key, mutex, release });
      }
      return await fn();
    } finally {
      for (const { key, mutex, release } of held.reverse()) {
        release();
        if (!mutex.locked) this.locks.delete(key);
      }
    }
  }

  private lockFor(key: string): Mutex {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }
    return mutex;
  }
}
