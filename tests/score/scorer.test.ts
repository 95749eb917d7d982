import { describe, it, expect } from 'vitest';
import { LeadScorer } from '../../src/score/scorer.js';
import { ScoringWeightsSchema } from '../../src/score/weights.js';
import type { AssessorRecord, ListingRecord, PermitRecord, StormRecord } from '../../src/types.js';

const asOf = new Date('2024-06-15T12:00:00Z');

const scorer = new LeadScorer({
  premiumPostalCodes: ['75024'],
  premiumCities: ['Plano', 'Frisco'],
  standardCities: ['Dallas', 'Garland'],
});

const assessor: AssessorRecord = {
  sourceType: 'assessor',
  sourceUrl: 'https://example.com/cad?zip=75024',
  fetchedAt: '2024-06-15T00:00:00.000Z',
  accountNumber: 'R-1001',
  address: '4521 Preston Rd',
  city: 'Sachse',
  postalCode: '75024',
  value: 450000,
  builtYear: 2009,
};

const permit: PermitRecord = {
  sourceType: 'permit',
  sourceUrl: 'https://example.com/permits',
  fetchedAt: '2024-06-15T00:00:00.000Z',
  permitId: 'BP-1',
  dateFiled: '2024-06-05',
  workDescription: 'Roof replacement, tear off',
  city: 'Austin',
  value: 18000,
};

describe('LeadScorer', () => {
  it('should score the premium ZIP assessor property at 9', () => {
    expect(scorer.explain(assessor, { asOf })).toEqual({
      base: 5,
      value: 1,
      age: 1.5,
      location: 1,
      source: 0.5,
      permitActivity: 0,
      storm: 0,
      recency: 0,
      total: 9,
    });
  });

  it('should be deterministic for the same record and asOf', () => {
    const scores = Array.from({ length: 5 }, () => scorer.score(assessor, { asOf }));
    expect(new Set(scores)).toEqual(new Set([9]));
  });

  it('should clamp to the configured range', () => {
    const flagged: PermitRecord = {
      ...permit,
      city: 'Plano',
      stormExposure: { eventDate: '2024-06-10', eventType: 'hail', hailSizeInches: 2.5 },
    };
    expect(scorer.explain(flagged, { asOf })).toMatchObject({
      value: 1,
      location: 1,
      source: 1,
      permitActivity: 1,
      storm: 2,
      recency: 2,
      total: 10,
    });
    expect(scorer.score(assessor, { asOf, prior: -20 })).toBe(1);
  });

  it('should use the source prior and value tiers', () => {
    const breakdown = scorer.explain(assessor, {
      asOf,
      prior: 4,
      valueTiers: [{ above: 400_000, points: 3 }],
    });
    expect(breakdown.base).toBe(4);
    expect(breakdown.value).toBe(3);
    expect(breakdown.total).toBe(10);
  });

  it('should score permit activity and recency', () => {
    expect(scorer.explain(permit, { asOf })).toMatchObject({
      value: 1,
      location: 0,
      source: 1,
      permitActivity: 1,
      recency: 2,
      total: 10,
    });

    const repair = { ...permit, workDescription: 'Shingle repair', dateFiled: '2024-04-01', value: 6000 };
    expect(scorer.explain(repair, { asOf })).toMatchObject({
      value: 0.5,
      permitActivity: 0.5,
      recency: 1,
      total: 8,
    });
  });

  it('should give standard cities half a point unless premium', () => {
    const listing: ListingRecord = {
      sourceType: 'listing',
      sourceUrl: 'https://example.com/homes',
      fetchedAt: '2024-06-15T00:00:00.000Z',
      listingId: 'Z-1',
      price: 250000,
      value: 250000,
      city: 'Garland',
      daysOnMarket: 3,
      builtYear: 1970,
    };
    expect(scorer.explain(listing, { asOf })).toMatchObject({
      value: 0.5,
      age: 0.5,
      location: 0.5,
      source: 0.25,
      recency: 1,
      total: 8,
    });
  });

  it('should weigh storm exposure by severity and age', () => {
    const mild = { ...assessor, stormExposure: { eventDate: '2024-04-01', eventType: 'wind' as const, windSpeedMph: 60 } };
    const severe = { ...assessor, stormExposure: { eventDate: '2024-04-01', eventType: 'wind' as const, windSpeedMph: 75 } };
    expect(scorer.explain(mild, { asOf }).storm).toBe(1);
    expect(scorer.explain(severe, { asOf }).storm).toBe(1.5);
  });

  it('should score storm records on event recency', () => {
    const storm: StormRecord = {
      sourceType: 'storm',
      sourceUrl: 'https://example.com/240601_rpts_filtered.csv',
      fetchedAt: '2024-06-02T00:00:00.000Z',
      eventId: '240601-hail-1800-33.0--96.7',
      eventDate: '2024-05-01',
      eventType: 'hail',
      hailSizeInches: 1.5,
      county: 'Collin',
    };
    expect(scorer.explain(storm, { asOf })).toMatchObject({ source: 0.75, recency: 1, total: 7 });
  });

  it('should accept weights from configuration', () => {
    const weights = ScoringWeightsSchema.parse({ base: 3, source_reliability: { assessor: 0 } });
    const custom = new LeadScorer({ weights, premiumPostalCodes: ['75024'] });
    expect(custom.score(assessor, { asOf })).toBe(7);
  });
});
