/**
 * Core type definitions for the roof-leads pipeline
 */

export type {
  SourceType,
  StormEventType,
  StormExposure,
  ListingRecord,
  AssessorRecord,
  PermitRecord,
  StormRecord,
  ExtractedRecord,
  RegionMatch,
  ScoreBreakdown,
  Lead,
} from './records.js';

// Result of a single proxied fetch, after retries
export interface FetchResult {
  url: string;
  success: boolean;
  status?: number;
  body?: string;
  error?: string;
  attempts: number;
  durationMs: number;
  // masked key used for the final attempt
  apiKey?: string;
}

// Raw outcome of a datastore insert
export type InsertResult =
  | { status: 'inserted' }
  | { status: 'unique_violation' }
  | { status: 'error'; error: string };

export type RejectReason = 'daily_limit' | 'storage_error';

// Outcome of submitting a lead to the persistence gateway
export type PersistOutcome =
  | { status: 'inserted'; identityHash: string }
  | { status: 'duplicate'; identityHash: string }
  | { status: 'rejected'; identityHash: string; reason: RejectReason; error?: string };

// Row as stored in one of the lead tables
export interface LeadRow {
  identity_hash: string;
  source_type: string;
  source_url: string;
  address: string | null;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  county: string | null;
  value: number | null;
  built_year: number | null;
  lead_score: number;
  in_region: boolean;
  region_match: string | null;
  storm_affected: boolean;
  fetched_at: string;
  details: Record<string, unknown>;
  score_breakdown: Record<string, number>;
  created_at?: string;
}

// Persistence sink contract
export interface Storage {
  insert(table: string, row: LeadRow): Promise<InsertResult>;
  exists(table: string, identityHash: string): Promise<boolean>;
  count(table: string): Promise<number>;
  recent(table: string, sinceHours: number, minScore?: number): Promise<LeadRow[]>;
  runMigrations(): Promise<void>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}

// Utility types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// Error types
export class FetchError extends Error {
  constructor(
    message: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}
