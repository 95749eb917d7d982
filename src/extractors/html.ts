/**
 * cheerio helpers shared by the HTML extractors
 */

import * as cheerio from 'cheerio';
import { cleanText } from '../util/parse.js';

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload);
}

export function firstAttr($: cheerio.CheerioAPI, selector: string, attr: string): string | undefined {
  const value = $(selector).first().attr(attr)?.trim();
  return value || undefined;
}

/**
 * Map a header cell to a field name through its aliases
 */
export function matchColumn(header: string, columns: Record<string, readonly string[]>): string | undefined {
  const normalized = header.trim().toLowerCase().replace(/\s+/g, ' ').replace(/:$/, '');
  for (const [field, aliases] of Object.entries(columns)) {
    if (aliases.includes(normalized)) {
      return field;
    }
  }
  return undefined;
}

/**
 * Read a results table into one field->text map per body row.
 * A cell's data-field attribute wins over its column header.
 */
export function readTable(
  $: cheerio.CheerioAPI,
  selector: string,
  columns: Record<string, readonly string[]>
): Array<Record<string, string>> {
  const table = $(selector).first();
  if (table.length === 0) {
    return [];
  }

  let headerCells = table.find('thead th');
  if (headerCells.length === 0) {
    headerCells = table.find('tr').first().find('th');
  }
  const fieldByIndex = headerCells.toArray().map(cell => matchColumn($(cell).text(), columns));

  const rows: Array<Record<string, string>> = [];
  table.find('tbody tr').each((_, row) => {
    const values: Record<string, string> = {};
    $(row)
      .find('td')
      .each((index, cell) => {
        const field = $(cell).attr('data-field') ?? fieldByIndex[index];
        const text = cleanText($(cell).text());
        if (field && text !== undefined) {
          values[field] = text;
        }
      });
    if (Object.keys(values).length > 0) {
      rows.push(values);
    }
  });

  return rows;
}
