// FIFO mutual exclusion per key. Work for one key runs one at a time in
// arrival order; different keys never wait on each other.

import { createDeferred } from "./utils/deferred.js";

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `task` once every earlier task for `key` has settled. */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const done = createDeferred<void>();
    const tail = previous.then(() => done.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      done.resolve();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /**
   * Hold every key in `keys` while `task` runs. Keys are taken in sorted
   * order, so two callers with overlapping key sets cannot deadlock.
   */
  async runExclusiveAll<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const acquire = (i: number): Promise<T> =>
      i === sorted.length ? task() : this.runExclusive(sorted[i], () => acquire(i + 1));
    return acquire(0);
  }
}
