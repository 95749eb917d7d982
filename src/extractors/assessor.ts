/**
 * County appraisal district (assessor) search results
 */

import { BaseExtractor } from './types.js';
import { ASSESSOR_COLUMNS, ASSESSOR_TABLE } from './selectors.js';
import { firstAttr, loadHtml, readTable } from './html.js';
import { parseAddressComponents } from '../util/address.js';
import { toDateString } from '../util/dates.js';
import { cleanText, parseBuiltYear, parseMoney } from '../util/parse.js';
import type { AssessorRecord } from '../types.js';

export class AssessorExtractor extends BaseExtractor<AssessorRecord> {
  readonly sourceType = 'assessor' as const;

  protected parse(content: string, sourceUrl: string, fetchedAt: string): AssessorRecord[] {
    const $ = loadHtml(content);
    const asOf = new Date(fetchedAt);
    // The results table may name its county once for every row
    const county = firstAttr($, ASSESSOR_TABLE, 'data-county');

    const records: AssessorRecord[] = [];
    for (const row of readTable($, ASSESSOR_TABLE, ASSESSOR_COLUMNS)) {
      const accountNumber = cleanText(row.accountNumber);
      if (!accountNumber) {
        continue;
      }

      const parts = parseAddressComponents(row.address);
      records.push({
        sourceType: 'assessor',
        sourceUrl,
        fetchedAt,
        accountNumber,
        ownerName: cleanText(row.ownerName),
        address: parts.street ?? cleanText(row.address),
        city: cleanText(row.city) ?? parts.city,
        state: parts.state ?? 'TX',
        postalCode: cleanText(row.postalCode) ?? parts.postalCode,
        county,
        value: parseMoney(row.value),
        builtYear: parseBuiltYear(row.builtYear, asOf),
        propertyType: cleanText(row.propertyType),
        lastSaleDate: toDateString(row.lastSaleDate),
      });
    }

    return records;
  }
}
