// SPDX-License-Identifier: Apache-2.0

const noop = (): void => {};

/** FIFO async lock: callers run one at a time, in arrival order. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // The chain must survive a failed holder, so the next waiter still runs.
    this.tail = run.then(noop, noop);
    return run;
  }
}

/** One Mutex per key, created on demand and dropped once nobody holds or waits on it. */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders++;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) this.locks.delete(key);
    }
  }

  /** Visible for testing: keys with a holder or waiter. */
  get size(): number {
    return this.locks.size;
  }
}
