/**
 * Scoring weights schema and defaults
 *
 * Every constant the scorer uses lives here so a pipeline config can tune
 * them without touching scorer code.
 */

import { z } from 'zod';

export const ValueTierSchema = z.object({
  above: z.number().nonnegative(),
  points: z.number(),
});

const AgeTierSchema = z.object({
  min_years: z.number().int().nonnegative(),
  max_years: z.number().int().nonnegative().optional(),
  points: z.number(),
});

const RecencyTierSchema = z.object({
  within_days: z.number().int().nonnegative(),
  points: z.number(),
});

export const ScoringWeightsSchema = z.object({
  base: z.number().default(5),
  min_score: z.number().int().default(1),
  max_score: z.number().int().default(10),

  // First threshold exceeded wins, so keep tiers in descending order
  property_value_tiers: z.array(ValueTierSchema).default([
    { above: 800_000, points: 2 },
    { above: 500_000, points: 1.5 },
    { above: 300_000, points: 1 },
    { above: 200_000, points: 0.5 },
  ]),
  permit_value_tiers: z.array(ValueTierSchema).default([
    { above: 50_000, points: 2 },
    { above: 25_000, points: 1.5 },
    { above: 15_000, points: 1 },
    { above: 5_000, points: 0.5 },
  ]),
  value_max: z.number().default(4),

  age_tiers: z.array(AgeTierSchema).default([
    { min_years: 10, max_years: 30, points: 1.5 },
    { min_years: 5, max_years: 40, points: 1 },
    { min_years: 41, points: 0.5 },
  ]),
  age_max: z.number().default(3),

  location: z.object({
    premium_postal_code: z.number().default(1),
    premium_city: z.number().default(1),
    standard_city: z.number().default(0.5),
    max: z.number().default(1.5),
  }).default({}),

  source_reliability: z.object({
    permit: z.number().default(1),
    storm: z.number().default(0.75),
    assessor: z.number().default(0.5),
    listing: z.number().default(0.25),
  }).default({}),

  permit_activity: z.object({
    replacement_keywords: z.array(z.string()).default([
      'roof replacement',
      'reroof',
      're-roof',
      'new roof',
      'roof replace',
    ]),
    replacement_points: z.number().default(1),
    repair_keywords: z.array(z.string()).default(['roof repair', 'roofing', 'shingle', 'storm damage', 'hail damage']),
    repair_points: z.number().default(0.5),
  }).default({}),

  storm: z.object({
    flagged: z.number().default(1),
    severe_hail_inches: z.number().default(2),
    severe_wind_mph: z.number().default(70),
    severe_bonus: z.number().default(0.5),
    recent_days: z.number().int().default(30),
    recent_bonus: z.number().default(0.5),
    max: z.number().default(2),
  }).default({}),

  recency: z.object({
    permit: z.array(RecencyTierSchema).default([
      { within_days: 30, points: 2 },
      { within_days: 90, points: 1 },
    ]),
    listing: z.array(RecencyTierSchema).default([
      { within_days: 7, points: 1 },
      { within_days: 30, points: 0.5 },
    ]),
    storm: z.array(RecencyTierSchema).default([
      { within_days: 30, points: 2 },
      { within_days: 60, points: 1 },
    ]),
    assessor: z.array(RecencyTierSchema).default([{ within_days: 90, points: 1 }]),
    max: z.number().default(2),
  }).default({}),
});

export type ValueTier = z.infer<typeof ValueTierSchema>;
export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = ScoringWeightsSchema.parse({});
