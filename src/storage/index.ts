/**
 * Storage layer factory
 */

import { resolve } from 'path';
import { StorageError, type Storage } from '../types.js';
import { logger } from '../util/logger.js';

export const DEFAULT_DATABASE_URL = 'sqlite://./data/leads.db';

/**
 * Create storage instance based on DATABASE_URL, falling back to Supabase
 * when only SUPABASE_URL and SUPABASE_KEY are set
 */
export async function createStorage(env: NodeJS.ProcessEnv = process.env): Promise<Storage> {
  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_KEY;

  if (!env.DATABASE_URL && supabaseUrl && supabaseKey) {
    logger.info('Creating storage instance', { supabaseUrl: sanitizeUrl(supabaseUrl) });
    const { SupabaseStorage } = await import('./supabase.js');
    return new SupabaseStorage(supabaseUrl, supabaseKey);
  }

  const databaseUrl = env.DATABASE_URL || DEFAULT_DATABASE_URL;

  logger.info('Creating storage instance', { databaseUrl: sanitizeUrl(databaseUrl) });

  if (databaseUrl.startsWith('sqlite://')) {
    const { SqliteStorage } = await import('./sqlite.js');
    const dbPath = databaseUrl.replace('sqlite://', '');
    return new SqliteStorage(dbPath === ':memory:' ? dbPath : resolve(process.cwd(), dbPath));
  }

  if (databaseUrl.startsWith('postgres://') || databaseUrl.startsWith('postgresql://')) {
    const { PostgresStorage } = await import('./postgres.js');
    return new PostgresStorage(databaseUrl);
  }

  throw new StorageError(`Unsupported database URL format: ${sanitizeUrl(databaseUrl)}`);
}

/**
 * Sanitize database URL for logging (remove credentials)
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      const port = parsed.port ? `:${parsed.port}` : '';
      return `${parsed.protocol}//${parsed.hostname}${port}${parsed.pathname}`;
    }
    return url;
  } catch {
    // If URL parsing fails, just hide everything after ://
    const parts = url.split('://');
    if (parts.length > 1) {
      return `${parts[0]}://***`;
    }
    return url;
  }
}

export { SqliteStorage } from './sqlite.js';
export { PersistenceGateway, type PersistenceGatewayOptions } from './gateway.js';
export { LEAD_TABLES, tableFor, isLeadTable, leadToRow, parseStoredRow } from './rows.js';
export type { Storage } from '../types.js';
