/**
 * CSV export utilities
 */

import { stringify } from 'csv-stringify';
import type { LeadRow } from '../types.js';

export interface CsvExportOptions {
  headers?: boolean;
  delimiter?: string;
  quote?: string;
}

const LEAD_COLUMNS = {
  lead_score: 'Score',
  source_type: 'Source',
  address: 'Address',
  city: 'City',
  state: 'State',
  postal_code: 'Postal Code',
  county: 'County',
  value: 'Value',
  built_year: 'Built Year',
  storm_affected: 'Storm Affected',
  region_match: 'Region Match',
  details: 'Details',
  source_url: 'Source URL',
  created_at: 'Created At',
  identity_hash: 'Identity Hash',
} as const;

/**
 * Convert stored lead rows to CSV, highest score first as given
 */
export function leadRowsToCSV(rows: readonly LeadRow[], options: CsvExportOptions = {}): Promise<string> {
  const { headers = true, delimiter = ',', quote = '"' } = options;

  const records = rows.map(row => ({
    lead_score: row.lead_score,
    source_type: row.source_type,
    address: row.address ?? '',
    city: row.city ?? '',
    state: row.state ?? '',
    postal_code: row.postal_code ?? '',
    county: row.county ?? '',
    value: row.value ?? '',
    built_year: row.built_year ?? '',
    storm_affected: row.storm_affected ? 'yes' : 'no',
    region_match: row.region_match ?? '',
    details: JSON.stringify(row.details),
    source_url: row.source_url,
    created_at: row.created_at ?? '',
    identity_hash: row.identity_hash,
  }));

  return new Promise((resolve, reject) => {
    stringify(
      records,
      {
        header: headers,
        delimiter,
        quote,
        columns: headers ? LEAD_COLUMNS : Object.keys(LEAD_COLUMNS),
      },
      (err, output) => {
        if (err) {
          reject(err);
        } else {
          resolve(output);
        }
      }
    );
  });
}
