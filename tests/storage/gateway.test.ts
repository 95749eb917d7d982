import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteStorage } from '../../src/storage/sqlite.js';
import { PersistenceGateway } from '../../src/storage/gateway.js';
import { DailyVolumeGovernor } from '../../src/governor/daily-governor.js';
import { identityHash } from '../../src/util/hash.js';
import { leadToRow } from '../../src/storage/rows.js';
import type { InsertResult, Lead, LeadRow, PermitRecord, Storage } from '../../src/types.js';

function permitLead(permitId: string, inRegion = true): Lead {
  const record: PermitRecord = {
    sourceType: 'permit',
    sourceUrl: 'https://example.com/permits?city=dallas',
    fetchedAt: '2024-06-15T08:00:00.000Z',
    permitId,
    workDescription: 'Roof replacement',
    city: inRegion ? 'Dallas' : 'Austin',
    value: 18000,
  };
  return {
    ...record,
    identityHash: identityHash(record),
    leadScore: 8,
    inRegion,
    regionMatch: inRegion ? 'city' : null,
    scoreBreakdown: {
      base: 5,
      value: 1,
      age: 0,
      location: 0.5,
      source: 1,
      permitActivity: 1,
      storm: 0,
      recency: 0,
      total: 8,
    },
  };
}

const now = () => new Date(2024, 5, 15, 9);

describe('PersistenceGateway', () => {
  let storage: SqliteStorage;

  beforeEach(async () => {
    storage = new SqliteStorage(':memory:');
    await storage.runMigrations();
  });

  afterEach(async () => {
    await storage.close();
  });

  it('should persist 50 concurrent submissions of one permit once', async () => {
    const governor = new DailyVolumeGovernor({ limit: 3000, now });
    const gateway = new PersistenceGateway({ storage, governor });
    const lead = permitLead('BP-1');

    const outcomes = await Promise.all(Array.from({ length: 50 }, () => gateway.persist(lead, 'city_permits')));

    expect(outcomes.filter(outcome => outcome.status === 'inserted')).toHaveLength(1);
    expect(outcomes.filter(outcome => outcome.status === 'duplicate')).toHaveLength(49);
    expect(await storage.count('permit_leads')).toBe(1);
    expect(governor.stats().total).toBe(1);
    expect(gateway.stats()).toEqual({ inserted: 1, duplicates: 49, rejectedDailyLimit: 0, storageErrors: 0 });
  });

  it('should rely on the unique constraint across gateways', async () => {
    const governor = new DailyVolumeGovernor({ limit: 3000, now });
    const first = new PersistenceGateway({ storage, governor });
    const second = new PersistenceGateway({ storage, governor });
    const lead = permitLead('BP-2');

    const [a, b] = await Promise.all([first.persist(lead), second.persist(lead)]);

    expect([a?.status, b?.status].sort()).toEqual(['duplicate', 'inserted']);
    expect(await storage.count('permit_leads')).toBe(1);
    expect(governor.stats().total).toBe(1);
  });

  it('should reject in-region leads past the daily limit', async () => {
    const governor = new DailyVolumeGovernor({ limit: 2, now });
    const gateway = new PersistenceGateway({ storage, governor });

    const outcomes = await Promise.all(['BP-1', 'BP-2', 'BP-3'].map(id => gateway.persist(permitLead(id))));

    expect(outcomes.map(outcome => outcome.status).sort()).toEqual(['inserted', 'inserted', 'rejected']);
    const rejected = outcomes.find(outcome => outcome.status === 'rejected');
    expect(rejected).toMatchObject({ reason: 'daily_limit' });
    expect(await storage.count('permit_leads')).toBe(2);
  });

  it('should not charge out-of-region leads against the limit', async () => {
    const governor = new DailyVolumeGovernor({ limit: 0, now });
    const gateway = new PersistenceGateway({ storage, governor });

    expect((await gateway.persist(permitLead('BP-5', false))).status).toBe('inserted');
    expect(governor.stats().total).toBe(0);
  });

  it('should release capacity and allow a retry after a storage error', async () => {
    let failNext = true;
    const flaky: Storage = {
      insert: async (table: string, row: LeadRow): Promise<InsertResult> => {
        if (failNext) {
          failNext = false;
          return { status: 'error', error: 'database is locked' };
        }
        return storage.insert(table, row);
      },
      exists: (table, hash) => storage.exists(table, hash),
      count: table => storage.count(table),
      recent: (table, hours, minScore) => storage.recent(table, hours, minScore),
      runMigrations: () => storage.runMigrations(),
      testConnection: () => storage.testConnection(),
      close: async () => undefined,
    };
    const governor = new DailyVolumeGovernor({ limit: 10, now });
    const gateway = new PersistenceGateway({ storage: flaky, governor });
    const lead = permitLead('BP-7');

    expect(await gateway.persist(lead)).toEqual({
      status: 'rejected',
      identityHash: lead.identityHash,
      reason: 'storage_error',
      error: 'database is locked',
    });
    expect(governor.stats().total).toBe(0);

    expect((await gateway.persist(lead)).status).toBe('inserted');
    expect(governor.stats().total).toBe(1);
    expect(gateway.stats().storageErrors).toBe(1);
  });

  it('should treat thrown insert errors as storage errors', async () => {
    const broken: Storage = {
      insert: async () => {
        throw new Error('connection reset');
      },
      exists: async () => false,
      count: async () => 0,
      recent: async () => [],
      runMigrations: async () => undefined,
      testConnection: async () => false,
      close: async () => undefined,
    };
    const gateway = new PersistenceGateway({
      storage: broken,
      governor: new DailyVolumeGovernor({ limit: 10, now }),
    });

    expect(await gateway.persist(permitLead('BP-8'))).toMatchObject({
      status: 'rejected',
      reason: 'storage_error',
      error: 'connection reset',
    });
  });

  it('should let a waiting submission store the lead when the first insert fails', async () => {
    let calls = 0;
    const slowThenFlaky: Storage = {
      insert: async (table: string, row: LeadRow): Promise<InsertResult> => {
        calls++;
        if (calls === 1) {
          await new Promise<void>(resolve => setImmediate(resolve));
          return { status: 'error', error: 'database is locked' };
        }
        return storage.insert(table, row);
      },
      exists: (table, hash) => storage.exists(table, hash),
      count: table => storage.count(table),
      recent: (table, hours, minScore) => storage.recent(table, hours, minScore),
      runMigrations: () => storage.runMigrations(),
      testConnection: () => storage.testConnection(),
      close: async () => undefined,
    };
    const governor = new DailyVolumeGovernor({ limit: 10, now });
    const gateway = new PersistenceGateway({ storage: slowThenFlaky, governor });
    const lead = permitLead('BP-9');

    const [first, second] = await Promise.all([gateway.persist(lead), gateway.persist(lead)]);

    expect(first).toMatchObject({ status: 'rejected', reason: 'storage_error' });
    expect(second).toEqual({ status: 'inserted', identityHash: lead.identityHash });
    expect(await storage.count('permit_leads')).toBe(1);
    expect(governor.stats().total).toBe(1);
    expect(gateway.stats()).toEqual({ inserted: 1, duplicates: 0, rejectedDailyLimit: 0, storageErrors: 1 });
  });

  it('should not let an already stored lead take the last daily slot', async () => {
    const stored = permitLead('BP-10');
    await storage.insert('permit_leads', leadToRow(stored));
    const governor = new DailyVolumeGovernor({ limit: 1, now });
    const gateway = new PersistenceGateway({ storage, governor });

    const outcomes = await Promise.all([gateway.persist(stored), gateway.persist(permitLead('BP-11'))]);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['duplicate', 'inserted']);
    expect(governor.stats()).toMatchObject({ total: 1, bySource: { permit: 1 } });
    expect(await storage.count('permit_leads')).toBe(2);
  });
});
