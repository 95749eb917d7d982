/**
 * Lead -> table row mapping
 */

import { z } from 'zod';
import type { Lead, LeadRow, SourceType } from '../types.js';

export const LEAD_TABLES: Record<SourceType, string> = {
  listing: 'listing_leads',
  assessor: 'assessor_leads',
  permit: 'permit_leads',
  storm: 'storm_events',
};

export function tableFor(sourceType: SourceType): string {
  return LEAD_TABLES[sourceType];
}

export function isLeadTable(name: string): boolean {
  return Object.values(LEAD_TABLES).includes(name);
}

function sourceDetails(lead: Lead): Record<string, unknown> {
  switch (lead.sourceType) {
    case 'listing':
      return {
        listingId: lead.listingId,
        price: lead.price,
        daysOnMarket: lead.daysOnMarket,
        propertyType: lead.propertyType,
        listedAt: lead.listedAt,
      };
    case 'assessor':
      return {
        accountNumber: lead.accountNumber,
        ownerName: lead.ownerName,
        propertyType: lead.propertyType,
        lastSaleDate: lead.lastSaleDate,
      };
    case 'permit':
      return {
        permitId: lead.permitId,
        dateFiled: lead.dateFiled,
        permitType: lead.permitType,
        workDescription: lead.workDescription,
      };
    case 'storm':
      return {
        eventId: lead.eventId,
        eventDate: lead.eventDate,
        eventType: lead.eventType,
        hailSizeInches: lead.hailSizeInches,
        windSpeedMph: lead.windSpeedMph,
      };
  }
}

/**
 * Source-specific fields that have no column of their own
 */
function detailsFor(lead: Lead): Record<string, unknown> {
  const details = sourceDetails(lead);
  if (lead.stormExposure) {
    details.stormExposure = lead.stormExposure;
  }

  // undefined would not survive a JSON round trip anyway
  return Object.fromEntries(Object.entries(details).filter(([, value]) => value !== undefined));
}

export function leadToRow(lead: Lead): LeadRow {
  return {
    identity_hash: lead.identityHash,
    source_type: lead.sourceType,
    source_url: lead.sourceUrl,
    address: lead.address ?? null,
    city: lead.city ?? null,
    state: lead.state ?? null,
    postal_code: lead.postalCode ?? null,
    county: lead.county ?? null,
    value: lead.value ?? null,
    built_year: lead.builtYear ?? null,
    lead_score: lead.leadScore,
    in_region: lead.inRegion,
    region_match: lead.regionMatch,
    storm_affected: lead.stormExposure !== undefined,
    fetched_at: lead.fetchedAt,
    details: detailsFor(lead),
    score_breakdown: { ...lead.scoreBreakdown },
  };
}

function parseJsonColumn(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

const booleanColumn = z.union([z.boolean(), z.number().transform(value => value !== 0)]);
const textColumn = z.string().nullable();
const numberColumn = z.preprocess(
  value => (value === null || value === undefined ? null : Number(value)),
  z.number().nullable()
);

/**
 * Row as read back from SQLite (0/1 booleans, JSON text) or Postgres
 * (booleans, jsonb, Date timestamps)
 */
export const StoredLeadRowSchema = z.object({
  identity_hash: z.string(),
  source_type: z.string(),
  source_url: z.string(),
  address: textColumn,
  city: textColumn,
  state: textColumn,
  postal_code: textColumn,
  county: textColumn,
  value: numberColumn,
  built_year: numberColumn,
  lead_score: z.coerce.number().int(),
  in_region: booleanColumn,
  region_match: textColumn,
  storm_affected: booleanColumn,
  fetched_at: z.string(),
  details: z.preprocess(parseJsonColumn, z.record(z.string(), z.unknown())),
  score_breakdown: z.preprocess(parseJsonColumn, z.record(z.string(), z.number())),
  created_at: z
    .union([z.string(), z.date().transform(date => date.toISOString())])
    .optional(),
});

export function parseStoredRow(raw: unknown): LeadRow {
  return StoredLeadRowSchema.parse(raw);
}
