/**
 * Rate-limited fetch client for a rotating proxy API
 *
 * Every request goes out as GET {endpoint}?api_key=..&url=..&render=..
 * under two independent limits: a concurrency cap (p-limit) and an hourly
 * sliding window. Failed attempts rotate the key and back off
 * exponentially; exhausted retries come back as an unsuccessful
 * FetchResult rather than an exception.
 */

import pLimit from 'p-limit';
import { ApiKeyPool } from './key-pool.js';
import { SlidingWindowLimiter } from './rate-limiter.js';
import { withBackoff, BackoffError, sleep as defaultSleep } from '../util/backoff.js';
import { logger as defaultLogger, maskSecret } from '../util/logger.js';
import { FetchError, type FetchResult, type Logger } from '../types.js';

export const DEFAULT_PROXY_ENDPOINT = 'http://api.scraperapi.com';

/**
 * The subset of the fetch API the client relies on
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponse>;

const globalFetch: HttpTransport = (url, init) => fetch(url, init);

export interface FetchClientOptions {
  keys: ApiKeyPool | readonly string[];
  endpoint?: string;
  maxConcurrent: number;
  requestsPerHour: number;
  retryAttempts: number;
  retryBackoffMs: number;
  jitterFactor?: number;
  timeoutMs: number;
  render?: boolean;
  transport?: HttpTransport;
  rateLimiter?: SlidingWindowLimiter;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

export interface FetchStats {
  requests: number;
  successes: number;
  failures: number;
  failedAttempts: number;
  keyRotations: number;
  rateLimitWaits: number;
  keyUsage: Record<string, number>;
}

export class ProxyFetchClient {
  private readonly keys: ApiKeyPool;
  private readonly endpoint: string;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly rateLimiter: SlidingWindowLimiter;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  private requests = 0;
  private successes = 0;
  private failures = 0;
  private failedAttempts = 0;

  constructor(private readonly options: FetchClientOptions) {
    this.keys = options.keys instanceof ApiKeyPool ? options.keys : new ApiKeyPool(options.keys);
    this.endpoint = options.endpoint ?? DEFAULT_PROXY_ENDPOINT;
    this.limit = pLimit(options.maxConcurrent);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.rateLimiter = options.rateLimiter ?? new SlidingWindowLimiter({
      limit: options.requestsPerHour,
      now: this.now,
      sleep: this.sleep,
    });
    this.transport = options.transport ?? globalFetch;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Fetch a page through the proxy. Never throws.
   */
  fetch(url: string): Promise<FetchResult> {
    return this.limit(() => this.fetchWithRetries(url));
  }

  stats(): FetchStats {
    return {
      requests: this.requests,
      successes: this.successes,
      failures: this.failures,
      failedAttempts: this.failedAttempts,
      keyRotations: this.keys.rotationCount,
      rateLimitWaits: this.rateLimiter.waitCount,
      keyUsage: this.keys.usageByKey(),
    };
  }

  private async fetchWithRetries(url: string): Promise<FetchResult> {
    const start = this.now();
    let attempts = 0;
    let lastStatus: number | undefined;
    let lastKey: string | undefined;

    try {
      const { body, status } = await withBackoff(
        async attempt => {
          attempts = attempt;
          await this.rateLimiter.acquire();

          const key = this.keys.current();
          lastKey = key;
          this.requests++;

          try {
            return await this.send(url, key);
          } catch (error) {
            this.failedAttempts++;
            if (error instanceof FetchError) {
              lastStatus = error.statusCode;
            }
            this.keys.rotate();
            throw error;
          }
        },
        {
          attempts: this.options.retryAttempts,
          initialDelayMs: this.options.retryBackoffMs,
          // uncapped so successive delays keep growing
          maxDelayMs: Number.POSITIVE_INFINITY,
          jitterFactor: this.options.jitterFactor ?? 0.5,
          sleep: this.sleep,
          random: this.options.random,
          logger: this.logger,
        }
      );

      this.successes++;
      return {
        url,
        success: true,
        status,
        body,
        attempts,
        durationMs: this.now() - start,
        apiKey: lastKey ? maskSecret(lastKey) : undefined,
      };
    } catch (error) {
      this.failures++;
      const message = error instanceof BackoffError ? error.lastError.message : String(error);

      this.logger.warn(`Fetch failed after ${attempts} attempts`, { url, error: message, status: lastStatus });

      return {
        url,
        success: false,
        status: lastStatus,
        error: message,
        attempts,
        durationMs: this.now() - start,
        apiKey: lastKey ? maskSecret(lastKey) : undefined,
      };
    }
  }

  private async send(url: string, apiKey: string): Promise<{ body: string; status: number }> {
    const params = new URLSearchParams({
      api_key: apiKey,
      url,
      render: String(this.options.render ?? false),
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.transport(`${this.endpoint}?${params.toString()}`, {
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status}`, response.status);
      }

      return { body: await response.text(), status: response.status };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchError(`Timed out after ${this.options.timeoutMs}ms`);
      }
      throw new FetchError(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }
  }
}
