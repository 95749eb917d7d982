/**
 * Storm Prediction Center daily storm reports (CSV)
 *
 * A report file holds up to three sections, each starting with its own
 * header row: tornado (F_Scale), wind (Speed, mph) and hail (Size, in
 * hundredths of an inch). The report date comes from the YYMMDD stamp in
 * the file name.
 */

import { parse as parseCSV } from 'csv-parse/sync';
import { BaseExtractor } from './types.js';
import { formatDateISO, parseReportStamp } from '../util/dates.js';
import { cleanText, parseNumber } from '../util/parse.js';
import type { StormEventType, StormRecord } from '../types.js';

const SECTION_BY_HEADER: Record<string, StormEventType> = {
  f_scale: 'tornado',
  speed: 'wind',
  size: 'hail',
};

export interface StormReportExtractorOptions {
  // two-letter state codes to keep; empty keeps every state
  states?: readonly string[];
}

export class StormReportExtractor extends BaseExtractor<StormRecord> {
  readonly sourceType = 'storm' as const;
  private readonly states: ReadonlySet<string>;

  constructor(options: StormReportExtractorOptions = {}) {
    super();
    this.states = new Set((options.states ?? ['TX']).map(state => state.toUpperCase()));
  }

  protected parse(content: string, sourceUrl: string, fetchedAt: string): StormRecord[] {
    const stamp = sourceUrl.match(/(\d{6})_rpts/)?.[1];
    const reportDate = (stamp ? parseReportStamp(stamp) : null) ?? new Date(fetchedAt);
    const eventDate = formatDateISO(reportDate);

    const rows: unknown = parseCSV(content, {
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
    if (!Array.isArray(rows)) {
      return [];
    }

    const records: StormRecord[] = [];
    let section: StormEventType | undefined;

    for (const raw of rows) {
      if (!Array.isArray(raw)) {
        continue;
      }
      const cells = raw.map(cell => String(cell));
      const [time, magnitude, location, county, state, lat, lon] = cells;

      if (time?.toLowerCase() === 'time') {
        section = SECTION_BY_HEADER[(magnitude ?? '').toLowerCase()];
        continue;
      }
      if (!section || !time || !state) {
        continue;
      }
      if (this.states.size > 0 && !this.states.has(state.toUpperCase())) {
        continue;
      }

      const measured = parseNumber(magnitude);
      records.push({
        sourceType: 'storm',
        sourceUrl,
        fetchedAt,
        eventId: [stamp ?? eventDate.replace(/-/g, ''), section, time, lat ?? '', lon ?? ''].join('-'),
        eventDate,
        eventType: section,
        hailSizeInches: section === 'hail' && measured !== undefined ? measured / 100 : undefined,
        windSpeedMph: section === 'wind' ? measured : undefined,
        city: cityFromLocation(location),
        county: titleCase(county),
        state: state.toUpperCase(),
      });
    }

    return records;
  }
}

/**
 * "2 N PLANO" -> "Plano"
 */
export function cityFromLocation(location: string | undefined): string | undefined {
  const stripped = cleanText(location)?.replace(/^\d+(\.\d+)?\s+[NSEW]{1,3}\s+/i, '');
  return titleCase(stripped);
}

function titleCase(value: string | undefined): string | undefined {
  const cleaned = cleanText(value);
  if (!cleaned) {
    return undefined;
  }
  return cleaned
    .toLowerCase()
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
