/**
 * Storm exposure index
 *
 * Collects storm events seen during a run so property, listing and permit
 * records in a hit county or city can be flagged before scoring.
 */

import { daysBetween, parseDate } from '../util/dates.js';
import { normalizeCity, normalizeCounty } from '../util/address.js';
import type { ExtractedRecord, StormExposure, StormRecord } from '../types.js';

export interface ExposureIndexOptions {
  lookbackDays: number;
  // hail (in) and wind (mph) that count as severity 1.0
  referenceHailInches?: number;
  referenceWindMph?: number;
}

export class StormExposureIndex {
  private readonly byCounty = new Map<string, StormRecord[]>();
  private readonly byCity = new Map<string, StormRecord[]>();
  private readonly seen = new Set<string>();
  private readonly lookbackDays: number;
  private readonly referenceHail: number;
  private readonly referenceWind: number;

  constructor(options: ExposureIndexOptions) {
    this.lookbackDays = options.lookbackDays;
    this.referenceHail = options.referenceHailInches ?? 2;
    this.referenceWind = options.referenceWindMph ?? 70;
  }

  get size(): number {
    return this.seen.size;
  }

  add(events: readonly StormRecord[]): void {
    for (const event of events) {
      if (this.seen.has(event.eventId)) {
        continue;
      }
      this.seen.add(event.eventId);

      const county = normalizeCounty(event.county);
      if (county) {
        append(this.byCounty, county, event);
      }
      const city = normalizeCity(event.city);
      if (city) {
        append(this.byCity, city, event);
      }
    }
  }

  /**
   * Most severe event within the lookback window that hit the record's
   * county or city
   */
  exposureFor(record: Pick<ExtractedRecord, 'county' | 'city'>, asOf: Date): StormExposure | undefined {
    const county = normalizeCounty(record.county);
    const city = normalizeCity(record.city);
    const candidates = [
      ...(county ? this.byCounty.get(county) ?? [] : []),
      ...(city ? this.byCity.get(city) ?? [] : []),
    ];

    let best: { event: StormRecord; severity: number; time: number } | undefined;
    for (const event of candidates) {
      const date = parseDate(event.eventDate);
      if (!date) {
        continue;
      }
      const age = daysBetween(date, asOf);
      if (age < 0 || age > this.lookbackDays) {
        continue;
      }

      const severity = this.severity(event);
      const time = date.getTime();
      if (!best || severity > best.severity || (severity === best.severity && time > best.time)) {
        best = { event, severity, time };
      }
    }

    if (!best) {
      return undefined;
    }
    return {
      eventDate: best.event.eventDate,
      eventType: best.event.eventType,
      hailSizeInches: best.event.hailSizeInches,
      windSpeedMph: best.event.windSpeedMph,
    };
  }

  /**
   * Copy of the record with stormExposure set when it was hit.
   * Storm records themselves are returned unchanged.
   */
  flag<T extends ExtractedRecord>(record: T, asOf: Date): T {
    if (record.sourceType === 'storm') {
      return record;
    }
    const exposure = this.exposureFor(record, asOf);
    return exposure ? { ...record, stormExposure: exposure } : record;
  }

  private severity(event: StormRecord): number {
    if (event.eventType === 'tornado') {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max(
      (event.hailSizeInches ?? 0) / this.referenceHail,
      (event.windSpeedMph ?? 0) / this.referenceWind
    );
  }
}

function append(map: Map<string, StormRecord[]>, key: string, event: StormRecord): void {
  const list = map.get(key);
  if (list) {
    list.push(event);
  } else {
    map.set(key, [event]);
  }
}
