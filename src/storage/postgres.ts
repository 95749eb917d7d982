/**
 * PostgreSQL storage implementation using pg
 */

import { Pool } from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { logger } from '../util/logger.js';
import { StorageError, type InsertResult, type LeadRow, type Storage } from '../types.js';
import { isLeadTable, parseStoredRow } from './rows.js';

const CountRowSchema = z.object({ count: z.coerce.number() });

export class PostgresStorage implements Storage {
  private pool: Pool;

  constructor(
    connectionString: string,
    private readonly migrationsDir: string = resolve(process.cwd(), 'src/storage/migrations/postgres')
  ) {
    this.pool = new Pool({ connectionString });
  }

  async insert(table: string, row: LeadRow): Promise<InsertResult> {
    if (!isLeadTable(table)) {
      return { status: 'error', error: `Unknown lead table: ${table}` };
    }

    const sql = `
      INSERT INTO ${table} (
        identity_hash, source_type, source_url, address, city, state,
        postal_code, county, value, built_year, lead_score, in_region,
        region_match, storm_affected, fetched_at, details, score_breakdown,
        created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, COALESCE($18::timestamptz, NOW()))
      ON CONFLICT (identity_hash) DO NOTHING
    `;

    try {
      const result = await this.pool.query(sql, [
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
        row.in_region,
        row.region_match,
        row.storm_affected,
        row.fetched_at,
        JSON.stringify(row.details),
        JSON.stringify(row.score_breakdown),
        row.created_at ?? null,
      ]);
      return result.rowCount === 0 ? { status: 'unique_violation' } : { status: 'inserted' };
    } catch (error) {
      return { status: 'error', error: error instanceof Error ? error.message : String(error) };
    }
  }

  async exists(table: string, identityHash: string): Promise<boolean> {
    this.assertLeadTable(table);
    try {
      const res = await this.pool.query(`SELECT 1 FROM ${table} WHERE identity_hash = $1 LIMIT 1`, [identityHash]);
      return (res.rowCount ?? 0) > 0;
    } catch (error) {
      throw new StorageError(`Failed to look up ${identityHash} in ${table}: ${error}`);
    }
  }

  async count(table: string): Promise<number> {
    this.assertLeadTable(table);
    try {
      const res = await this.pool.query(`SELECT COUNT(*)::int AS count FROM ${table}`);
      return CountRowSchema.parse(res.rows[0]).count;
    } catch (error) {
      throw new StorageError(`Failed to count ${table}: ${error}`);
    }
  }

  async recent(table: string, sinceHours: number, minScore = 1): Promise<LeadRow[]> {
    this.assertLeadTable(table);
    try {
      const res = await this.pool.query(
        `
          SELECT * FROM ${table}
          WHERE created_at >= NOW() - make_interval(hours => $1)
            AND lead_score >= $2
          ORDER BY lead_score DESC, created_at DESC
        `,
        [sinceHours, minScore]
      );
      return res.rows.map(parseStoredRow);
    } catch (error) {
      throw new StorageError(`Failed to read recent leads from ${table}: ${error}`);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('PostgreSQL database connection pool closed');
  }

  // Migration runner (used by src/storage/migrations/run.ts)
  async runMigrations(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const files = readdirSync(this.migrationsDir)
        .filter(f => f.endsWith('.sql'))
        .sort();

      await client.query('BEGIN');
      for (const file of files) {
        const fullPath = resolve(this.migrationsDir, file);
        // Execute as a single batch; PostgreSQL supports multiple statements
        await client.query(readFileSync(fullPath, 'utf-8'));
      }
      await client.query('COMMIT');
      logger.info('PostgreSQL migrations completed', { files });
    } catch (error) {
      await client.query('ROLLBACK');
      throw new StorageError(`PostgreSQL migration failed: ${error}`);
    } finally {
      client.release();
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      const res = await this.pool.query('SELECT 1');
      return res.rowCount === 1;
    } catch (error) {
      logger.error('PostgreSQL connection test failed', { error });
      return false;
    }
  }

  private assertLeadTable(table: string): void {
    if (!isLeadTable(table)) {
      throw new StorageError(`Unknown lead table: ${table}`);
    }
  }
}
