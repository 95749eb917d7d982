/**
 * Municipal building permit search results
 *
 * Only roofing and storm related permits are kept, plus any permit valued
 * above PERMIT_MIN_VALUE.
 */

import { BaseExtractor } from './types.js';
import { PERMIT_COLUMNS, PERMIT_MIN_VALUE, PERMIT_TABLE, ROOFING_PERMIT_KEYWORDS } from './selectors.js';
import { firstAttr, loadHtml, readTable } from './html.js';
import { parseAddressComponents } from '../util/address.js';
import { toDateString } from '../util/dates.js';
import { cleanText, parseMoney } from '../util/parse.js';
import type { PermitRecord } from '../types.js';

export function isRoofingRelated(permit: Pick<PermitRecord, 'permitType' | 'workDescription' | 'value'>): boolean {
  const text = `${permit.permitType ?? ''} ${permit.workDescription ?? ''}`.toLowerCase();
  if (ROOFING_PERMIT_KEYWORDS.some(keyword => text.includes(keyword))) {
    return true;
  }
  return (permit.value ?? 0) > PERMIT_MIN_VALUE;
}

export class PermitExtractor extends BaseExtractor<PermitRecord> {
  readonly sourceType = 'permit' as const;

  protected parse(content: string, sourceUrl: string, fetchedAt: string): PermitRecord[] {
    const $ = loadHtml(content);
    const tableCity = firstAttr($, PERMIT_TABLE, 'data-city');
    const county = firstAttr($, PERMIT_TABLE, 'data-county');

    const records: PermitRecord[] = [];
    for (const row of readTable($, PERMIT_TABLE, PERMIT_COLUMNS)) {
      const permitId = cleanText(row.permitId);
      if (!permitId) {
        continue;
      }

      const parts = parseAddressComponents(row.address);
      const record: PermitRecord = {
        sourceType: 'permit',
        sourceUrl,
        fetchedAt,
        permitId,
        dateFiled: toDateString(row.dateFiled),
        permitType: cleanText(row.permitType),
        workDescription: cleanText(row.workDescription),
        address: parts.street ?? cleanText(row.address),
        city: cleanText(row.city) ?? parts.city ?? tableCity,
        state: parts.state ?? 'TX',
        postalCode: cleanText(row.postalCode) ?? parts.postalCode,
        county,
        value: parseMoney(row.value),
      };

      if (isRoofingRelated(record)) {
        records.push(record);
      }
    }

    return records;
  }
}
