/**
 * Deduplicating persistence gateway
 *
 * persist() records a claim for the lead's identity hash in a bounded
 * in-process map before its first await. A concurrent submission of the
 * same lead waits on that claim: it is a duplicate once the claimant has a
 * stored row, and tries again itself when the claimant stored nothing.
 * Across processes the store's UNIQUE identity_hash constraint decides.
 *
 * In-region leads reserve daily capacity before the insert and give it back
 * when the insert does not produce a new row. A lead whose row already
 * exists is turned away before reserving; a row written by another process
 * between that lookup and the insert still holds a slot until the insert
 * reports the conflict.
 */

import { LRUCache } from 'lru-cache';
import { leadToRow, tableFor } from './rows.js';
import { logger as defaultLogger } from '../util/logger.js';
import type { DailyVolumeGovernor, Reservation } from '../governor/daily-governor.js';
import type { InsertResult, Lead, Logger, PersistOutcome, Storage } from '../types.js';

export interface PersistenceGatewayOptions {
  storage: Storage;
  governor: DailyVolumeGovernor;
  seenCapacity?: number;
  logger?: Logger;
}

export interface GatewayStats {
  inserted: number;
  duplicates: number;
  rejectedDailyLimit: number;
  storageErrors: number;
}

export class PersistenceGateway {
  private readonly storage: Storage;
  private readonly governor: DailyVolumeGovernor;
  // identity hash -> resolves true once a row for it is stored
  private readonly claims: LRUCache<string, Promise<boolean>>;
  private readonly logger: Logger;
  private readonly counters: GatewayStats = {
    inserted: 0,
    duplicates: 0,
    rejectedDailyLimit: 0,
    storageErrors: 0,
  };

  constructor(options: PersistenceGatewayOptions) {
    this.storage = options.storage;
    this.governor = options.governor;
    this.claims = new LRUCache<string, Promise<boolean>>({ max: options.seenCapacity ?? 100_000 });
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Persist a scored lead exactly once. `source` is the configured source
   * name charged against the daily limit.
   */
  async persist(lead: Lead, source: string = lead.sourceType): Promise<PersistOutcome> {
    const identityHash = lead.identityHash;

    const claim = this.claims.get(identityHash);
    if (claim) {
      if (await claim) {
        this.counters.duplicates++;
        return { status: 'duplicate', identityHash };
      }
      return this.persist(lead, source);
    }

    const outcome = this.store(lead, source);
    this.claims.set(
      identityHash,
      outcome.then(
        result => result.status !== 'rejected',
        () => {
          this.claims.delete(identityHash);
          return false;
        }
      )
    );
    return outcome;
  }

  private async store(lead: Lead, source: string): Promise<PersistOutcome> {
    const identityHash = lead.identityHash;
    const table = tableFor(lead.sourceType);

    let reservation: Reservation | null = null;
    if (lead.inRegion) {
      if (await this.exists(table, identityHash)) {
        this.counters.duplicates++;
        return { status: 'duplicate', identityHash };
      }

      reservation = await this.governor.reserve(source);
      if (!reservation) {
        this.claims.delete(identityHash);
        this.counters.rejectedDailyLimit++;
        return { status: 'rejected', identityHash, reason: 'daily_limit' };
      }
    }

    const result = await this.insert(table, lead);

    if (result.status === 'inserted') {
      this.counters.inserted++;
      return { status: 'inserted', identityHash };
    }

    if (reservation) {
      await this.governor.release(reservation);
    }

    if (result.status === 'unique_violation') {
      this.counters.duplicates++;
      return { status: 'duplicate', identityHash };
    }

    this.claims.delete(identityHash);
    this.counters.storageErrors++;
    this.logger.error('Failed to persist lead', {
      table,
      source,
      identityHash,
      sourceUrl: lead.sourceUrl,
      error: result.error,
    });
    return { status: 'rejected', identityHash, reason: 'storage_error', error: result.error };
  }

  stats(): GatewayStats {
    return { ...this.counters };
  }

  private async exists(table: string, identityHash: string): Promise<boolean> {
    try {
      return await this.storage.exists(table, identityHash);
    } catch (error) {
      this.logger.warn('Identity lookup failed, leaving it to the unique constraint', {
        table,
        identityHash,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async insert(table: string, lead: Lead): Promise<InsertResult> {
    try {
      return await this.storage.insert(table, leadToRow(lead));
    } catch (error) {
      return { status: 'error', error: error instanceof Error ? error.message : String(error) };
    }
  }
}
