/**
 * Zod schemas for extracted records.
 *
 * Extractors produce these shapes and the fetch cache re-validates them on
 * load, so a cached batch always matches a fresh extraction.
 */

import { z } from 'zod';

export const SOURCE_TYPES = ['listing', 'assessor', 'permit', 'storm'] as const;
export const STORM_EVENT_TYPES = ['hail', 'wind', 'tornado'] as const;

export const SourceTypeSchema = z.enum(SOURCE_TYPES);
export const StormEventTypeSchema = z.enum(STORM_EVENT_TYPES);

export const StormExposureSchema = z.object({
  eventDate: z.string(),
  eventType: StormEventTypeSchema,
  hailSizeInches: z.number().optional(),
  windSpeedMph: z.number().optional(),
});

const RecordBaseSchema = z.object({
  sourceUrl: z.string().min(1),
  fetchedAt: z.string(),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  county: z.string().optional(),
  value: z.number().optional(),
  builtYear: z.number().int().optional(),
  stormExposure: StormExposureSchema.optional(),
});

export const ListingRecordSchema = RecordBaseSchema.extend({
  sourceType: z.literal('listing'),
  listingId: z.string().min(1),
  price: z.number().nonnegative(),
  daysOnMarket: z.number().int().nonnegative().optional(),
  propertyType: z.string().optional(),
  listedAt: z.string().optional(),
});

export const AssessorRecordSchema = RecordBaseSchema.extend({
  sourceType: z.literal('assessor'),
  accountNumber: z.string().min(1),
  ownerName: z.string().optional(),
  propertyType: z.string().optional(),
  lastSaleDate: z.string().optional(),
});

export const PermitRecordSchema = RecordBaseSchema.extend({
  sourceType: z.literal('permit'),
  permitId: z.string().min(1),
  dateFiled: z.string().optional(),
  permitType: z.string().optional(),
  workDescription: z.string().optional(),
});

export const StormRecordSchema = RecordBaseSchema.extend({
  sourceType: z.literal('storm'),
  eventId: z.string().min(1),
  eventDate: z.string(),
  eventType: StormEventTypeSchema,
  hailSizeInches: z.number().nonnegative().optional(),
  windSpeedMph: z.number().nonnegative().optional(),
});

export const ExtractedRecordSchema = z.discriminatedUnion('sourceType', [
  ListingRecordSchema,
  AssessorRecordSchema,
  PermitRecordSchema,
  StormRecordSchema,
]);

export type SourceType = z.infer<typeof SourceTypeSchema>;
export type StormEventType = z.infer<typeof StormEventTypeSchema>;
export type StormExposure = z.infer<typeof StormExposureSchema>;
export type ListingRecord = z.infer<typeof ListingRecordSchema>;
export type AssessorRecord = z.infer<typeof AssessorRecordSchema>;
export type PermitRecord = z.infer<typeof PermitRecordSchema>;
export type StormRecord = z.infer<typeof StormRecordSchema>;
export type ExtractedRecord = z.infer<typeof ExtractedRecordSchema>;

export type RegionMatch = 'county' | 'postal_code' | 'city';

/**
 * Per-signal contributions behind a lead score
 */
export interface ScoreBreakdown {
  base: number;
  value: number;
  age: number;
  location: number;
  source: number;
  permitActivity: number;
  storm: number;
  recency: number;
  total: number;
}

/**
 * A scored, geo-classified record ready for persistence
 */
export type Lead = ExtractedRecord & {
  identityHash: string;
  leadScore: number;
  inRegion: boolean;
  regionMatch: RegionMatch | null;
  scoreBreakdown: ScoreBreakdown;
};
