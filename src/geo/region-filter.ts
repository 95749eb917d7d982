/**
 * Region membership with county > postal code > city precedence
 *
 * County is the most reliable signal; city names collide across regions,
 * so they are consulted last.
 */

import { normalizeCity, normalizeCounty, normalizePostalCode } from '../util/address.js';
import type { Region } from '../config/region.js';
import type { ExtractedRecord, RegionMatch } from '../types.js';

export interface RegionClassification {
  inRegion: boolean;
  matchedBy: RegionMatch | null;
}

type Locatable = Pick<ExtractedRecord, 'county' | 'postalCode' | 'city'>;

export class RegionFilter {
  private readonly counties: ReadonlySet<string>;
  private readonly postalCodes: ReadonlySet<string>;
  private readonly cities: ReadonlySet<string>;

  constructor(region: Pick<Region, 'counties' | 'postal_codes' | 'cities'>) {
    this.counties = toSet(region.counties, normalizeCounty);
    this.postalCodes = toSet(region.postal_codes, normalizePostalCode);
    this.cities = toSet(region.cities, normalizeCity);
  }

  classify(record: Locatable): RegionClassification {
    const county = normalizeCounty(record.county);
    if (county && this.counties.has(county)) {
      return { inRegion: true, matchedBy: 'county' };
    }

    const postalCode = normalizePostalCode(record.postalCode);
    if (postalCode && this.postalCodes.has(postalCode)) {
      return { inRegion: true, matchedBy: 'postal_code' };
    }

    const city = normalizeCity(record.city);
    if (city && this.cities.has(city)) {
      return { inRegion: true, matchedBy: 'city' };
    }

    return { inRegion: false, matchedBy: null };
  }

  isInRegion(record: Locatable): boolean {
    return this.classify(record).inRegion;
  }

  partition<T extends Locatable>(records: readonly T[]): { inRegion: T[]; outOfRegion: T[] } {
    const inRegion: T[] = [];
    const outOfRegion: T[] = [];
    for (const record of records) {
      (this.isInRegion(record) ? inRegion : outOfRegion).push(record);
    }
    return { inRegion, outOfRegion };
  }
}

function toSet(values: readonly string[], normalize: (value: string) => string | undefined): Set<string> {
  const set = new Set<string>();
  for (const value of values) {
    const normalized = normalize(value);
    if (normalized) {
      set.add(normalized);
    }
  }
  return set;
}
