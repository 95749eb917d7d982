/**
 * Supabase storage implementation over the PostgREST API
 *
 * Tables are the Postgres ones from migrations/postgres; the REST API cannot
 * run DDL, so runMigrations only verifies that they exist.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../util/logger.js';
import { StorageError, type InsertResult, type LeadRow, type Storage } from '../types.js';
import { isLeadTable, LEAD_TABLES, parseStoredRow } from './rows.js';

const UNIQUE_VIOLATION = '23505';
const UNDEFINED_TABLE = '42P01';

export class SupabaseStorage implements Storage {
  private readonly client: SupabaseClient;

  constructor(url: string, key: string) {
    this.client = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  async insert(table: string, row: LeadRow): Promise<InsertResult> {
    if (!isLeadTable(table)) {
      return { status: 'error', error: `Unknown lead table: ${table}` };
    }

    const { error } = await this.client.from(table).insert({
      ...row,
      created_at: row.created_at ?? new Date().toISOString(),
    });

    if (!error) {
      return { status: 'inserted' };
    }
    if (error.code === UNIQUE_VIOLATION) {
      return { status: 'unique_violation' };
    }
    return { status: 'error', error: `${error.code}: ${error.message}` };
  }

  async exists(table: string, identityHash: string): Promise<boolean> {
    this.assertLeadTable(table);
    const { count, error } = await this.client
      .from(table)
      .select('identity_hash', { count: 'exact', head: true })
      .eq('identity_hash', identityHash);
    if (error) {
      throw new StorageError(`Failed to look up ${identityHash} in ${table}: ${error.message}`);
    }
    return (count ?? 0) > 0;
  }

  async count(table: string): Promise<number> {
    this.assertLeadTable(table);
    const { count, error } = await this.client.from(table).select('*', { count: 'exact', head: true });
    if (error) {
      throw new StorageError(`Failed to count ${table}: ${error.message}`);
    }
    return count ?? 0;
  }

  async recent(table: string, sinceHours: number, minScore = 1): Promise<LeadRow[]> {
    this.assertLeadTable(table);
    const since = new Date(Date.now() - sinceHours * 60 * 60 * 1000).toISOString();

    const { data, error } = await this.client
      .from(table)
      .select('*')
      .gte('created_at', since)
      .gte('lead_score', minScore)
      .order('lead_score', { ascending: false })
      .order('created_at', { ascending: false });

    if (error) {
      throw new StorageError(`Failed to read recent leads from ${table}: ${error.message}`);
    }
    return (data ?? []).map(parseStoredRow);
  }

  async runMigrations(): Promise<void> {
    const missing: string[] = [];
    for (const table of Object.values(LEAD_TABLES)) {
      const { error } = await this.client.from(table).select('identity_hash', { head: true });
      if (error?.code === UNDEFINED_TABLE) {
        missing.push(table);
      } else if (error) {
        throw new StorageError(`Failed to check table ${table}: ${error.message}`);
      }
    }

    if (missing.length > 0) {
      throw new StorageError(
        `Missing tables: ${missing.join(', ')}. Apply src/storage/migrations/postgres in the Supabase SQL editor.`
      );
    }
    logger.info('Supabase tables verified', { tables: Object.values(LEAD_TABLES) });
  }

  async testConnection(): Promise<boolean> {
    const { error } = await this.client.from(LEAD_TABLES.permit).select('identity_hash', { head: true });
    if (error) {
      logger.error('Supabase connection test failed', { error: error.message, code: error.code });
      return false;
    }
    return true;
  }

  async close(): Promise<void> {
    // the REST client holds no connection
    logger.debug('Supabase storage closed');
  }

  private assertLeadTable(table: string): void {
    if (!isLeadTable(table)) {
      throw new StorageError(`Unknown lead table: ${table}`);
    }
  }
}
