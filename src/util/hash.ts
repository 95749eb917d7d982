/**
 * Record identity and content hashing
 */

import { createHash } from 'crypto';
import type { ExtractedRecord } from '../types.js';
import { normalizeAddress, normalizeCity, normalizeCounty } from './address.js';

/**
 * Fields that identify a record across re-fetches, in hash order
 */
export function identityFields(record: ExtractedRecord): string[] {
  switch (record.sourceType) {
    case 'listing':
      return [record.listingId, normalizeAddress(record.address) ?? '', String(record.price)];
    case 'assessor':
      return [record.accountNumber];
    case 'permit':
      return [record.permitId];
    case 'storm':
      return [
        record.eventId,
        record.eventDate,
        normalizeCounty(record.county) ?? '',
        normalizeCity(record.city) ?? '',
      ];
  }
}

/**
 * Hex SHA-256 of `sourceType|field1|field2|...`
 */
export function identityHash(record: ExtractedRecord): string {
  const key = [record.sourceType, ...identityFields(record)].join('|');
  return createHash('sha256').update(key).digest('hex');
}

/**
 * Hex MD5 of a fetched body, used for change detection only
 */
export function contentHash(body: string): string {
  return createHash('md5').update(body).digest('hex');
}
