/**
 * SQLite storage implementation using better-sqlite3
 */

import Database from 'better-sqlite3';
import { mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { logger } from '../util/logger.js';
import { StorageError, type InsertResult, type LeadRow, type Storage } from '../types.js';
import { isLeadTable, LEAD_TABLES, parseStoredRow } from './rows.js';

const CountRowSchema = z.object({ count: z.number() });

export interface SqliteStorageOptions {
  migrationsDir?: string;
  now?: () => Date;
}

/**
 * SQLite storage implementation
 */
export class SqliteStorage implements Storage {
  private db: Database.Database;
  private readonly migrationsDir: string;
  private readonly now: () => Date;

  constructor(dbPath: string, options: SqliteStorageOptions = {}) {
    const inMemory = dbPath === ':memory:';

    // Ensure directory exists
    if (!inMemory) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    // Enable WAL mode for better concurrency between processes
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');

    this.migrationsDir = options.migrationsDir ?? resolve(process.cwd(), 'src/storage/migrations/sqlite');
    this.now = options.now ?? (() => new Date());

    logger.info('SQLite database initialized', { path: dbPath });
  }

  /**
   * Insert a lead row; an existing identity_hash is reported, not raised
   */
  async insert(table: string, row: LeadRow): Promise<InsertResult> {
    if (!isLeadTable(table)) {
      return { status: 'error', error: `Unknown lead table: ${table}` };
    }

    try {
      const stmt = this.db.prepare(`
        INSERT INTO ${table} (
          identity_hash, source_type, source_url, address, city, state,
          postal_code, county, value, built_year, lead_score, in_region,
          region_match, storm_affected, fetched_at, details, score_breakdown,
          created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(identity_hash) DO NOTHING
      `);

      const info = stmt.run(
        row.identity_hash,
        row.source_type,
        row.source_url,
        row.address,
        row.city,
        row.state,
        row.postal_code,
        row.county,
        row.value,
        row.built_year,
        row.lead_score,
        row.in_region ? 1 : 0,
        row.region_match,
        row.storm_affected ? 1 : 0,
        row.fetched_at,
        JSON.stringify(row.details),
        JSON.stringify(row.score_breakdown),
        row.created_at ?? this.now().toISOString()
      );

      return info.changes === 0 ? { status: 'unique_violation' } : { status: 'inserted' };
    } catch (error) {
      return { status: 'error', error: error instanceof Error ? error.message : String(error) };
    }
  }

  async exists(table: string, identityHash: string): Promise<boolean> {
    this.assertLeadTable(table);
    try {
      const row = this.db.prepare(`SELECT 1 FROM ${table} WHERE identity_hash = ? LIMIT 1`).get(identityHash);
      return row !== undefined;
    } catch (error) {
      throw new StorageError(`Failed to look up ${identityHash} in ${table}: ${error}`);
    }
  }

  async count(table: string): Promise<number> {
    this.assertLeadTable(table);
    try {
      const row = this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get();
      return CountRowSchema.parse(row).count;
    } catch (error) {
      throw new StorageError(`Failed to count ${table}: ${error}`);
    }
  }

  /**
   * Leads created within the last `sinceHours`, best first
   */
  async recent(table: string, sinceHours: number, minScore = 1): Promise<LeadRow[]> {
    this.assertLeadTable(table);
    try {
      const since = new Date(this.now().getTime() - sinceHours * 60 * 60 * 1000).toISOString();
      const rows = this.db
        .prepare(`
          SELECT * FROM ${table}
          WHERE created_at >= ?
            AND lead_score >= ?
          ORDER BY lead_score DESC, created_at DESC
        `)
        .all(since, minScore);
      return rows.map(parseStoredRow);
    } catch (error) {
      throw new StorageError(`Failed to read recent leads from ${table}: ${error}`);
    }
  }

  /**
   * Run database migrations
   */
  async runMigrations(): Promise<void> {
    try {
      // Load all .sql files in alphabetical order
      const files = readdirSync(this.migrationsDir)
        .filter(f => f.endsWith('.sql'))
        .sort();

      this.db.transaction(() => {
        for (const file of files) {
          this.db.exec(readFileSync(resolve(this.migrationsDir, file), 'utf-8'));
        }
      })();

      logger.info('SQLite migrations completed', { files, tables: Object.values(LEAD_TABLES) });
    } catch (error) {
      throw new StorageError(`Migration failed: ${error}`);
    }
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.error('SQLite connection test failed', { error });
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      this.db.close();
      logger.info('SQLite database connection closed');
    } catch (error) {
      throw new StorageError(`Failed to close database: ${error}`);
    }
  }

  private assertLeadTable(table: string): void {
    if (!isLeadTable(table)) {
      throw new StorageError(`Unknown lead table: ${table}`);
    }
  }
}
