/**
 * Incremental per-URL fetch cache
 *
 * Remembers when each URL was last fetched along with the batch of records
 * extracted from it. Within the cache window the orchestrator reuses the
 * stored batch instead of fetching again.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { ExtractedRecordSchema } from '../records.js';
import { Mutex } from '../util/mutex.js';
import { logger as defaultLogger } from '../util/logger.js';
import type { ExtractedRecord, Logger } from '../types.js';

export { contentHash } from '../util/hash.js';

const HOUR_MS = 60 * 60 * 1000;

export interface CacheEntry {
  contentHash: string;
  // epoch milliseconds
  fetchedAt: number;
  records: ExtractedRecord[];
}

const CacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.string(),
    z.object({
      contentHash: z.string(),
      fetchedAt: z.number(),
      records: z.array(z.unknown()),
    })
  ),
});

export interface FetchCacheOptions {
  source: string;
  cacheDurationHours: number;
  incremental?: boolean;
  // directory for <source>-cache.json; null keeps the cache in memory
  stateDir?: string | null;
  now?: () => number;
  logger?: Logger;
}

export class FetchCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly mutex = new Mutex();
  private readonly durationMs: number;
  private readonly incremental: boolean;
  private readonly now: () => number;
  private readonly logger: Logger;
  readonly filePath: string | null;

  constructor(options: FetchCacheOptions) {
    this.durationMs = options.cacheDurationHours * HOUR_MS;
    this.incremental = options.incremental ?? true;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
    this.filePath = options.stateDir
      ? resolve(options.stateDir, `${options.source}-cache.json`)
      : null;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * True when the URL is unknown, stale, or incremental mode is off
   */
  shouldFetch(url: string): boolean {
    if (!this.incremental) {
      return true;
    }
    const entry = this.entries.get(url);
    return !entry || this.isExpired(entry);
  }

  /**
   * Fresh cached entry for a URL, if any
   */
  get(url: string): CacheEntry | undefined {
    const entry = this.entries.get(url);
    if (!entry || this.isExpired(entry)) {
      return undefined;
    }
    return entry;
  }

  record(url: string, contentHash: string, records: ExtractedRecord[]): void {
    this.entries.set(url, {
      contentHash,
      fetchedAt: this.now(),
      records: [...records],
    });
  }

  /**
   * Read the persisted cache, dropping expired and malformed entries
   */
  async load(): Promise<number> {
    if (!this.filePath || !existsSync(this.filePath)) {
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (error) {
      this.logger.warn('Ignoring unreadable fetch cache', { path: this.filePath, error });
      return 0;
    }

    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Ignoring fetch cache with unexpected shape', { path: this.filePath });
      return 0;
    }

    let loaded = 0;
    let dropped = 0;
    for (const [url, stored] of Object.entries(parsed.data.entries)) {
      const records = z.array(ExtractedRecordSchema).safeParse(stored.records);
      const entry = records.success
        ? { contentHash: stored.contentHash, fetchedAt: stored.fetchedAt, records: records.data }
        : undefined;

      if (!entry || this.isExpired(entry)) {
        dropped++;
        continue;
      }

      this.entries.set(url, entry);
      loaded++;
    }

    this.logger.debug('Fetch cache loaded', { path: this.filePath, loaded, dropped });
    return loaded;
  }

  /**
   * Persist the cache atomically (temp file + rename). Saves are serialized.
   */
  save(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const filePath = this.filePath;
      if (!filePath) {
        return;
      }

      const entries: Record<string, CacheEntry> = {};
      for (const [url, entry] of this.entries) {
        if (!this.isExpired(entry)) {
          entries[url] = entry;
        }
      }

      await mkdir(dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await writeFile(tempPath, JSON.stringify({ version: 1, entries }), 'utf-8');
      await rename(tempPath, filePath);
    });
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.fetchedAt > this.durationMs;
  }
}
