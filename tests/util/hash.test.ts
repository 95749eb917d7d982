import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { contentHash, identityFields, identityHash } from '../../src/util/hash.js';
import type { ListingRecord, PermitRecord, StormRecord } from '../../src/types.js';

const listing: ListingRecord = {
  sourceType: 'listing',
  sourceUrl: 'https://example.com/homes/75024_rb/',
  fetchedAt: '2024-06-01T00:00:00.000Z',
  listingId: 'L-100',
  address: '123 Main Street',
  price: 450000,
};

describe('hashing', () => {
  it('should hash sourceType and identity fields with SHA-256', () => {
    const permit: PermitRecord = {
      sourceType: 'permit',
      sourceUrl: 'https://example.com/permits',
      fetchedAt: '2024-06-01T00:00:00.000Z',
      permitId: 'BP-2024-0001',
    };
    const expected = createHash('sha256').update('permit|BP-2024-0001').digest('hex');
    expect(identityHash(permit)).toBe(expected);
  });

  it('should normalize listing addresses before hashing', () => {
    expect(identityFields(listing)).toEqual(['L-100', '123 MAIN ST', '450000']);
    expect(identityHash({ ...listing, address: '123 MAIN ST' })).toBe(identityHash(listing));
    expect(identityHash({ ...listing, price: 445000 })).not.toBe(identityHash(listing));
  });

  it('should ignore fetch metadata', () => {
    const refetched = { ...listing, fetchedAt: '2024-06-02T00:00:00.000Z', sourceUrl: 'https://example.com/other' };
    expect(identityHash(refetched)).toBe(identityHash(listing));
  });

  it('should key storm events on id, date and normalized location', () => {
    const storm: StormRecord = {
      sourceType: 'storm',
      sourceUrl: 'https://example.com/240315_rpts_filtered.csv',
      fetchedAt: '2024-03-16T00:00:00.000Z',
      eventId: '240315-hail-1830',
      eventDate: '2024-03-15',
      eventType: 'hail',
      county: 'Collin County',
      city: 'Plano',
    };
    expect(identityFields(storm)).toEqual(['240315-hail-1830', '2024-03-15', 'collin', 'plano']);
  });

  it('should compute an MD5 content hash', () => {
    expect(contentHash('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
  });
});
