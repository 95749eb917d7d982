import { describe, it, expect } from 'vitest';
import { BackoffError, computeBackoffDelay, withBackoff } from '../../src/util/backoff.js';

describe('backoff', () => {
  it('should double the delay per attempt and add bounded jitter', () => {
    const options = { initialDelayMs: 1000, maxDelayMs: Number.POSITIVE_INFINITY, jitterFactor: 0.5 };
    expect(computeBackoffDelay(1, { ...options, random: () => 0 })).toBe(1000);
    expect(computeBackoffDelay(3, { ...options, random: () => 0 })).toBe(4000);
    expect(computeBackoffDelay(1, { ...options, random: () => 0.999 })).toBe(1499);
  });

  it('should cap the base delay', () => {
    expect(computeBackoffDelay(10, { initialDelayMs: 1000, maxDelayMs: 5000, random: () => 0 })).toBe(5000);
  });

  it('should retry until success', async () => {
    const delays: number[] = [];
    const retried: number[] = [];
    const result = await withBackoff(
      async attempt => {
        if (attempt < 3) {
          throw new Error(`attempt ${attempt}`);
        }
        return 'done';
      },
      {
        attempts: 3,
        initialDelayMs: 10,
        random: () => 0,
        sleep: async ms => {
          delays.push(ms);
        },
        onRetry: info => {
          retried.push(info.attempt);
        },
      }
    );
    expect(result).toBe('done');
    expect(delays).toEqual([10, 20]);
    expect(retried).toEqual([1, 2]);
  });

  it('should throw BackoffError after the last attempt', async () => {
    let calls = 0;
    const failing = withBackoff(
      async () => {
        calls++;
        throw new Error('still down');
      },
      { attempts: 2, sleep: async () => undefined }
    );
    await expect(failing).rejects.toBeInstanceOf(BackoffError);
    await expect(failing).rejects.toThrow('Failed after 2 attempts: still down');
    expect(calls).toBe(2);
  });
});
