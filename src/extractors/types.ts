/**
 * Extractor contract
 */

import type { ExtractedRecord, SourceType } from '../types.js';

export interface ExtractionResult<T extends ExtractedRecord = ExtractedRecord> {
  records: T[];
  error?: string;
}

/**
 * Turns one fetched page into records. Pure: no shared state, no I/O.
 */
export interface Extractor<T extends ExtractedRecord = ExtractedRecord> {
  readonly sourceType: SourceType;

  /** Never throws; a page that cannot be parsed yields [] */
  extract(content: string, sourceUrl: string, fetchedAt: string): T[];

  /** Same as extract, but reports why a page yielded nothing */
  tryExtract(content: string, sourceUrl: string, fetchedAt: string): ExtractionResult<T>;
}

export abstract class BaseExtractor<T extends ExtractedRecord> implements Extractor<T> {
  abstract readonly sourceType: SourceType;

  protected abstract parse(content: string, sourceUrl: string, fetchedAt: string): T[];

  extract(content: string, sourceUrl: string, fetchedAt: string): T[] {
    return this.tryExtract(content, sourceUrl, fetchedAt).records;
  }

  tryExtract(content: string, sourceUrl: string, fetchedAt: string): ExtractionResult<T> {
    try {
      return { records: this.parse(content, sourceUrl, fetchedAt) };
    } catch (error) {
      return {
        records: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
