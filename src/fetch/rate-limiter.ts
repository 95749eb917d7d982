/**
 * In-process sliding-window rate limiter
 *
 * Allows at most `limit` acquisitions in any rolling window (one hour by
 * default). Independent of the concurrency limit: a caller can hold a
 * concurrency slot and still wait here.
 */

import { sleep as defaultSleep } from '../util/backoff.js';

const HOUR_MS = 60 * 60 * 1000;

export interface SlidingWindowLimiterOptions {
  limit: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class SlidingWindowLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  // acquisition timestamps, oldest first
  private readonly stamps: number[] = [];
  private waits = 0;

  constructor(options: SlidingWindowLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit <= 0) {
      throw new Error(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? HOUR_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until a slot is free in the current window, then take it
   */
  async acquire(): Promise<void> {
    while (true) {
      const retryAfterMs = this.tryAcquire();
      if (retryAfterMs === 0) {
        return;
      }
      this.waits++;
      await this.sleep(retryAfterMs);
    }
  }

  /**
   * Take a slot if one is free. Returns 0 on success, otherwise the
   * milliseconds until the oldest slot leaves the window.
   */
  tryAcquire(): number {
    const now = this.now();
    this.evict(now);

    if (this.stamps.length < this.limit) {
      this.stamps.push(now);
      return 0;
    }

    const oldest = this.stamps[0] ?? now;
    return Math.max(oldest + this.windowMs - now, 1);
  }

  /**
   * Slots used in the current window
   */
  inWindow(): number {
    this.evict(this.now());
    return this.stamps.length;
  }

  get waitCount(): number {
    return this.waits;
  }

  private evict(now: number): void {
    const windowStart = now - this.windowMs;
    while (this.stamps.length > 0 && (this.stamps[0] ?? now) <= windowStart) {
      this.stamps.shift();
    }
  }
}
