/**
 * Lead scoring
 *
 * One weighted sum for every source type: base (or the source prior),
 * value, age, location, source reliability, permit activity, storm exposure
 * and recency. The sum is rounded and clamped to [min_score, max_score].
 * Scoring depends only on the record, the weights and `asOf`, never on the
 * wall clock.
 */

import { DEFAULT_SCORING_WEIGHTS, type ScoringWeights, type ValueTier } from './weights.js';
import { daysBetween, daysSince, parseDate } from '../util/dates.js';
import { normalizeCity, normalizePostalCode } from '../util/address.js';
import type { ExtractedRecord, ScoreBreakdown, StormExposure } from '../types.js';

export interface ScoringContext {
  weights?: ScoringWeights;
  premiumPostalCodes?: readonly string[];
  premiumCities?: readonly string[];
  standardCities?: readonly string[];
}

export interface ScoreOptions {
  asOf: Date;
  // base score override for the record's source
  prior?: number;
  valueTiers?: readonly ValueTier[];
}

export class LeadScorer {
  private readonly weights: ScoringWeights;
  private readonly premiumPostalCodes: ReadonlySet<string>;
  private readonly premiumCities: ReadonlySet<string>;
  private readonly standardCities: ReadonlySet<string>;

  constructor(context: ScoringContext = {}) {
    this.weights = context.weights ?? DEFAULT_SCORING_WEIGHTS;
    this.premiumPostalCodes = new Set((context.premiumPostalCodes ?? []).map(code => normalizePostalCode(code) ?? code));
    this.premiumCities = new Set((context.premiumCities ?? []).map(city => normalizeCity(city) ?? city));
    this.standardCities = new Set((context.standardCities ?? []).map(city => normalizeCity(city) ?? city));
  }

  /**
   * Integer score in [min_score, max_score]
   */
  score(record: ExtractedRecord, options: ScoreOptions): number {
    return this.explain(record, options).total;
  }

  /**
   * Per-signal contributions; `total` is the final clamped score
   */
  explain(record: ExtractedRecord, options: ScoreOptions): ScoreBreakdown {
    const breakdown = {
      base: options.prior ?? this.weights.base,
      value: this.valuePoints(record, options.valueTiers),
      age: this.agePoints(record.builtYear, options.asOf),
      location: this.locationPoints(record),
      source: this.weights.source_reliability[record.sourceType],
      permitActivity: this.permitActivityPoints(record),
      storm: this.stormPoints(record.stormExposure, options.asOf),
      recency: this.recencyPoints(record, options.asOf),
    };

    const sum =
      breakdown.base +
      breakdown.value +
      breakdown.age +
      breakdown.location +
      breakdown.source +
      breakdown.permitActivity +
      breakdown.storm +
      breakdown.recency;

    return {
      ...breakdown,
      total: clamp(Math.round(sum), this.weights.min_score, this.weights.max_score),
    };
  }

  private valuePoints(record: ExtractedRecord, override?: readonly ValueTier[]): number {
    if (record.value === undefined) {
      return 0;
    }
    const tiers = override ?? (record.sourceType === 'permit'
      ? this.weights.permit_value_tiers
      : this.weights.property_value_tiers);
    const value = record.value;
    const tier = tiers.find(candidate => value > candidate.above);
    return clamp(tier?.points ?? 0, 0, this.weights.value_max);
  }

  private agePoints(builtYear: number | undefined, asOf: Date): number {
    if (builtYear === undefined) {
      return 0;
    }
    const age = asOf.getFullYear() - builtYear;
    if (age < 0) {
      return 0;
    }
    const tier = this.weights.age_tiers.find(
      candidate => age >= candidate.min_years && (candidate.max_years === undefined || age <= candidate.max_years)
    );
    return clamp(tier?.points ?? 0, 0, this.weights.age_max);
  }

  private locationPoints(record: ExtractedRecord): number {
    const weights = this.weights.location;
    let points = 0;

    const postalCode = normalizePostalCode(record.postalCode);
    if (postalCode && this.premiumPostalCodes.has(postalCode)) {
      points += weights.premium_postal_code;
    }

    const city = normalizeCity(record.city);
    if (city && this.premiumCities.has(city)) {
      points += weights.premium_city;
    } else if (city && this.standardCities.has(city)) {
      points += weights.standard_city;
    }

    return clamp(points, 0, weights.max);
  }

  private permitActivityPoints(record: ExtractedRecord): number {
    if (record.sourceType !== 'permit') {
      return 0;
    }
    const weights = this.weights.permit_activity;
    const text = `${record.permitType ?? ''} ${record.workDescription ?? ''}`.toLowerCase();

    if (weights.replacement_keywords.some(keyword => text.includes(keyword.toLowerCase()))) {
      return weights.replacement_points;
    }
    if (weights.repair_keywords.some(keyword => text.includes(keyword.toLowerCase()))) {
      return weights.repair_points;
    }
    return 0;
  }

  private stormPoints(exposure: StormExposure | undefined, asOf: Date): number {
    if (!exposure) {
      return 0;
    }
    const weights = this.weights.storm;
    let points = weights.flagged;

    const severeHail = (exposure.hailSizeInches ?? 0) >= weights.severe_hail_inches;
    const severeWind = (exposure.windSpeedMph ?? 0) >= weights.severe_wind_mph;
    if (severeHail || severeWind) {
      points += weights.severe_bonus;
    }

    const eventDate = parseDate(exposure.eventDate);
    if (eventDate) {
      const age = daysBetween(eventDate, asOf);
      if (age >= 0 && age <= weights.recent_days) {
        points += weights.recent_bonus;
      }
    }

    return clamp(points, weights.flagged, weights.max);
  }

  private recencyPoints(record: ExtractedRecord, asOf: Date): number {
    const recency = this.weights.recency;
    let days: number | null = null;

    switch (record.sourceType) {
      case 'permit':
        days = daysSince(record.dateFiled, asOf);
        break;
      case 'listing':
        days = record.daysOnMarket ?? daysSince(record.listedAt, asOf);
        break;
      case 'storm':
        days = daysSince(record.eventDate, asOf);
        break;
      case 'assessor':
        days = daysSince(record.lastSaleDate, asOf);
        break;
    }

    if (days === null || days < 0) {
      return 0;
    }
    const elapsed = days;
    const tier = recency[record.sourceType].find(candidate => elapsed <= candidate.within_days);
    return clamp(tier?.points ?? 0, 0, recency.max);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
