/**
 * Region reference data: target counties, postal codes and cities
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../types.js';
import { logger } from '../util/logger.js';

export const RegionSchema = z.object({
  name: z.string().min(1),
  label: z.string().optional(),
  counties: z.array(z.string().min(1)).min(1),
  postal_codes: z.array(z.string().regex(/^\d{5}$/)).min(1),
  cities: z.array(z.string().min(1)).min(1),
  premium_postal_codes: z.array(z.string().regex(/^\d{5}$/)).default([]),
  premium_cities: z.array(z.string().min(1)).default([]),
  standard_cities: z.array(z.string().min(1)).default([]),
});

export type Region = z.infer<typeof RegionSchema>;

const regionCache = new Map<string, Region>();

/**
 * Load and validate configs/regions/<name>.json
 */
export function loadRegion(name: string): Region {
  const cached = regionCache.get(name);
  if (cached) {
    return cached;
  }

  const regionPath = resolve(process.cwd(), 'configs', 'regions', `${name}.json`);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(regionPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read region '${name}' from ${regionPath}: ${error}`);
  }

  const parsed = RegionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid region '${name}':\n${parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n')}`
    );
  }

  regionCache.set(name, parsed.data);
  logger.debug(`Loaded region ${name}`, {
    counties: parsed.data.counties.length,
    postalCodes: parsed.data.postal_codes.length,
    cities: parsed.data.cities.length,
  });

  return parsed.data;
}

export function clearRegionCache(): void {
  regionCache.clear();
}
