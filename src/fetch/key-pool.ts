/**
 * Round-robin pool of proxy API keys
 */

import { maskSecret } from '../util/logger.js';

export class ApiKeyPool {
  private readonly keys: readonly string[];
  private cursor = 0;
  private rotations = 0;
  private readonly usage = new Map<string, number>();

  constructor(keys: readonly string[]) {
    if (keys.length === 0) {
      throw new Error('ApiKeyPool requires at least one key');
    }
    this.keys = [...keys];
  }

  get size(): number {
    return this.keys.length;
  }

  /**
   * Key for the next attempt; counts one use
   */
  current(): string {
    const key = this.keys[this.cursor % this.keys.length] ?? '';
    this.usage.set(key, (this.usage.get(key) ?? 0) + 1);
    return key;
  }

  /**
   * Advance to the next key. Single synchronous step, so concurrent callers
   * each move the cursor exactly once.
   */
  rotate(): void {
    this.cursor = (this.cursor + 1) % this.keys.length;
    this.rotations++;
  }

  get rotationCount(): number {
    return this.rotations;
  }

  /**
   * Per-key usage, keyed by masked key
   */
  usageByKey(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const key of this.keys) {
      result[maskSecret(key)] = this.usage.get(key) ?? 0;
    }
    return result;
  }
}
