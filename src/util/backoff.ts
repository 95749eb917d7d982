/**
 * Exponential backoff utility with jitter for proxied requests
 */

import { logger as defaultLogger } from './logger.js';
import type { Logger } from '../types.js';

export interface BackoffOptions {
  // total attempts, including the first one
  attempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  // jitter is drawn from [0, baseDelay * jitterFactor); keep it <= 1
  jitterFactor?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
  /** Called after a failed attempt, before waiting for the next one */
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
}

export class BackoffError extends Error {
  constructor(
    message: string,
    public attempts: number,
    public lastError: Error
  ) {
    super(message);
    this.name = 'BackoffError';
  }
}

/**
 * Delay before the attempt following `attempt` (1-based):
 * initialDelayMs * 2^(attempt-1), capped, plus jitter.
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<BackoffOptions, 'initialDelayMs' | 'maxDelayMs' | 'jitterFactor' | 'random'> = {}
): number {
  const {
    initialDelayMs = 1000,
    maxDelayMs = 60000,
    jitterFactor = 0.5,
    random = Math.random,
  } = options;

  const baseDelay = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  const jitter = initialDelayMs * Math.min(jitterFactor, 1) * random();
  return Math.floor(baseDelay + jitter);
}

/**
 * Execute a function with exponential backoff retry logic
 */
export async function withBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    attempts = 3,
    sleep: wait = sleep,
    logger = defaultLogger,
    onRetry,
  } = options;

  let lastError = new Error('No attempts made');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === attempts) {
        break;
      }

      const delay = computeBackoffDelay(attempt, options);

      logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
        error: lastError.message,
        attempt,
        attempts,
        delay,
      });

      onRetry?.({ attempt, delayMs: delay, error: lastError });
      await wait(delay);
    }
  }

  throw new BackoffError(
    `Failed after ${attempts} attempts: ${lastError.message}`,
    attempts,
    lastError
  );
}

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
