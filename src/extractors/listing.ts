/**
 * Real-estate listing extractor
 *
 * Reads listing cards marked with data-listing-id; pages without cards fall
 * back to schema.org JSON-LD residence blocks.
 */

import type { CheerioAPI } from 'cheerio';
import { BaseExtractor } from './types.js';
import { LISTING_JSON_LD_TYPES, LISTING_SELECTORS } from './selectors.js';
import { loadHtml } from './html.js';
import { parseAddressComponents } from '../util/address.js';
import { toDateString } from '../util/dates.js';
import { cleanText, parseBuiltYear, parseInteger, parseMoney } from '../util/parse.js';
import type { ListingRecord } from '../types.js';

export class ListingExtractor extends BaseExtractor<ListingRecord> {
  readonly sourceType = 'listing' as const;

  protected parse(content: string, sourceUrl: string, fetchedAt: string): ListingRecord[] {
    const $ = loadHtml(content);
    const cards = this.fromCards($, sourceUrl, fetchedAt);
    return cards.length > 0 ? cards : this.fromJsonLd($, sourceUrl, fetchedAt);
  }

  private fromCards($: CheerioAPI, sourceUrl: string, fetchedAt: string): ListingRecord[] {
    const asOf = new Date(fetchedAt);
    const records: ListingRecord[] = [];

    $(LISTING_SELECTORS.card).each((_, element) => {
      const card = $(element);
      const listingId = card.attr('data-listing-id')?.trim();
      const price = parseMoney(card.find(LISTING_SELECTORS.price).first().text());
      if (!listingId || price === undefined) {
        return;
      }

      const addressText = cleanText(card.find(LISTING_SELECTORS.address).first().text());
      const parts = parseAddressComponents(addressText);

      records.push({
        sourceType: 'listing',
        sourceUrl,
        fetchedAt,
        listingId,
        price,
        value: price,
        address: parts.street ?? addressText,
        city: parts.city ?? cleanText(card.attr('data-city')),
        state: parts.state,
        postalCode: parts.postalCode ?? cleanText(card.attr('data-postal-code')),
        county: cleanText(card.attr('data-county')),
        builtYear: parseBuiltYear(card.find(LISTING_SELECTORS.yearBuilt).first().text(), asOf),
        daysOnMarket: parseInteger(card.find(LISTING_SELECTORS.daysOnMarket).first().text()),
        propertyType: cleanText(card.find(LISTING_SELECTORS.propertyType).first().text()),
        listedAt: toDateString(card.attr('data-listed-at')),
      });
    });

    return records;
  }

  private fromJsonLd($: CheerioAPI, sourceUrl: string, fetchedAt: string): ListingRecord[] {
    const asOf = new Date(fetchedAt);
    const records: ListingRecord[] = [];

    $(LISTING_SELECTORS.jsonLd).each((_, element) => {
      for (const node of flattenJsonLd(parseJson($(element).text()))) {
        if (!hasListingType(node)) {
          continue;
        }

        const listingId = listingIdFrom(node);
        const offers = asRecord(node.offers);
        const price = parseMoney(stringValue(offers?.price) ?? stringValue(node.price));
        if (!listingId || price === undefined) {
          continue;
        }

        const address = asRecord(node.address);
        records.push({
          sourceType: 'listing',
          sourceUrl,
          fetchedAt,
          listingId,
          price,
          value: price,
          address: cleanText(stringValue(address?.streetAddress)),
          city: cleanText(stringValue(address?.addressLocality)),
          state: cleanText(stringValue(address?.addressRegion)),
          postalCode: cleanText(stringValue(address?.postalCode)),
          builtYear: parseBuiltYear(stringValue(node.yearBuilt), asOf),
          propertyType: typeName(node),
        });
      }
    });

    return records;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function stringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function flattenJsonLd(value: unknown): Array<Record<string, unknown>> {
  if (Array.isArray(value)) {
    return value.flatMap(flattenJsonLd);
  }
  const node = asRecord(value);
  if (!node) {
    return [];
  }
  return Array.isArray(node['@graph']) ? [node, ...flattenJsonLd(node['@graph'])] : [node];
}

function typeName(node: Record<string, unknown>): string | undefined {
  const type = node['@type'];
  if (typeof type === 'string') return type;
  if (Array.isArray(type)) return type.find((entry): entry is string => typeof entry === 'string');
  return undefined;
}

function hasListingType(node: Record<string, unknown>): boolean {
  const type = node['@type'];
  const types = Array.isArray(type) ? type : [type];
  return types.some(entry => typeof entry === 'string' && LISTING_JSON_LD_TYPES.includes(entry));
}

// Prefer the trailing numeric id of the listing URL ("/homedetails/.../12345_zpid/")
function listingIdFrom(node: Record<string, unknown>): string | undefined {
  const raw = stringValue(node['@id']) ?? stringValue(node.url) ?? stringValue(node.identifier);
  if (!raw) {
    return undefined;
  }
  const numeric = raw.match(/(\d{5,})(?:_zpid)?\/?$/);
  return numeric?.[1] ?? raw;
}
