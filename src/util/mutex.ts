/**
 * Async mutual exclusion on top of p-limit
 */

import pLimit from 'p-limit';

export class Mutex {
  private readonly limit = pLimit(1);

  /**
   * Run `fn` once every previously queued critical section has settled.
   * Never await another runExclusive of the same mutex from inside `fn`.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.limit(fn);
  }
}
