/**
 * Zod schemas for validating pipeline configuration files
 */

import { z } from 'zod';
import { SourceTypeSchema } from '../records.js';
import { ScoringWeightsSchema, ValueTierSchema } from '../score/weights.js';

export const URL_PLACEHOLDERS = ['postal_code', 'county', 'city', 'date'] as const;
export type UrlPlaceholder = (typeof URL_PLACEHOLDERS)[number];

/**
 * Fetch and cache tuning shared by every source unless overridden
 */
export const FetchDefaultsSchema = z.object({
  max_concurrent: z.number().int().positive().default(10),
  requests_per_hour: z.number().int().positive().default(1000),
  retry_attempts: z.number().int().positive().default(3),
  retry_backoff_ms: z.number().int().positive().default(1500),
  jitter_factor: z.number().min(0).max(1).default(0.5),
  timeout_ms: z.number().int().positive().default(30_000),
  render: z.boolean().default(false),
  cache_duration_hours: z.number().positive().default(12),
  incremental: z.boolean().default(true),
}).strict();

/**
 * Schema for an individual scrape source
 */
export const SourceConfigSchema = z.object({
  name: z.string().min(1).regex(/^[a-z0-9_-]+$/, 'must be lowercase letters, digits, - or _'),
  type: SourceTypeSchema,
  enabled: z.boolean().default(true),
  url_templates: z.array(z.string().min(1)).default([]),
  urls: z.array(z.string().url()).default([]),

  // Values substituted into the URL templates
  postal_codes: z.array(z.string().regex(/^\d{5}$/)).default([]),
  counties: z.array(z.string().min(1)).default([]),
  cities: z.array(z.string().min(1)).default([]),
  // {date} expands to one YYMMDD stamp per offset, counted back from today
  date_offsets_days: z.array(z.number().int().nonnegative()).default([0]),

  target_limit: z.number().int().positive().optional().describe('Maximum URLs per run'),

  max_concurrent: z.number().int().positive().optional(),
  requests_per_hour: z.number().int().positive().optional(),
  retry_attempts: z.number().int().positive().optional(),
  retry_backoff_ms: z.number().int().positive().optional(),
  jitter_factor: z.number().min(0).max(1).optional(),
  timeout_ms: z.number().int().positive().optional(),
  render: z.boolean().optional(),
  cache_duration_hours: z.number().positive().optional(),
  incremental: z.boolean().optional(),

  prior: z.number().optional().describe('Base score override for this source'),
  value_tiers: z.array(ValueTierSchema).optional(),
}).strict();

/**
 * Schema for a pipeline configuration
 */
export const PipelineConfigSchema = z.object({
  name: z.string().min(1),
  region: z.string().min(1).describe('Region file under configs/regions'),
  daily_limit: z.number().int().nonnegative().default(3000),
  state_dir: z.string().default('./state'),
  storm_lookback_days: z.number().int().positive().default(30),
  proxy: z.object({
    endpoint: z.string().url().default('http://api.scraperapi.com'),
  }).strict().default({}),
  defaults: FetchDefaultsSchema.default({}),
  scoring: ScoringWeightsSchema.default({}),
  sources: z.array(SourceConfigSchema).min(1),
}).strict();

export type FetchDefaults = z.infer<typeof FetchDefaultsSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Source settings with every default applied
 */
export type ResolvedSourceConfig = Omit<SourceConfig, keyof FetchDefaults> & FetchDefaults;

/**
 * Placeholders referenced by a URL template
 */
export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(/\{([a-z_]+)\}/g), match => match[1] ?? '');
}

function isUrlPlaceholder(value: string): value is UrlPlaceholder {
  return URL_PLACEHOLDERS.some(placeholder => placeholder === value);
}

/**
 * Validate source names and URL templates
 */
export function validateSources(config: PipelineConfig): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const source of config.sources) {
    if (seen.has(source.name)) {
      errors.push(`Duplicate source name: '${source.name}'`);
    }
    seen.add(source.name);

    if (source.url_templates.length === 0 && source.urls.length === 0) {
      errors.push(`Source '${source.name}' has neither url_templates nor urls`);
    }

    for (const template of source.url_templates) {
      for (const placeholder of templatePlaceholders(template)) {
        if (!isUrlPlaceholder(placeholder)) {
          errors.push(`Source '${source.name}' template uses unknown placeholder '{${placeholder}}'`);
          continue;
        }
        if (placeholder === 'postal_code' && source.postal_codes.length === 0) {
          errors.push(`Source '${source.name}' uses {postal_code} but lists no postal_codes`);
        }
        if (placeholder === 'county' && source.counties.length === 0) {
          errors.push(`Source '${source.name}' uses {county} but lists no counties`);
        }
        if (placeholder === 'city' && source.cities.length === 0) {
          errors.push(`Source '${source.name}' uses {city} but lists no cities`);
        }
      }
    }
  }

  return errors;
}

/**
 * Comprehensive validation of a pipeline configuration
 */
export function validatePipelineConfig(config: unknown): {
  success: boolean;
  data?: PipelineConfig;
  errors: string[];
} {
  try {
    // First, validate against Zod schema
    const parsed = PipelineConfigSchema.parse(config);

    // Then run cross-field checks
    const sourceErrors = validateSources(parsed);
    if (sourceErrors.length > 0) {
      return {
        success: false,
        errors: sourceErrors,
      };
    }

    return {
      success: true,
      data: parsed,
      errors: [],
    };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        success: false,
        errors: error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      };
    }

    return {
      success: false,
      errors: [`Validation error: ${error}`],
    };
  }
}

/**
 * Apply the pipeline defaults to a source
 */
export function resolveSource(config: PipelineConfig, source: SourceConfig): ResolvedSourceConfig {
  const defaults = config.defaults;
  return {
    ...source,
    max_concurrent: source.max_concurrent ?? defaults.max_concurrent,
    requests_per_hour: source.requests_per_hour ?? defaults.requests_per_hour,
    retry_attempts: source.retry_attempts ?? defaults.retry_attempts,
    retry_backoff_ms: source.retry_backoff_ms ?? defaults.retry_backoff_ms,
    jitter_factor: source.jitter_factor ?? defaults.jitter_factor,
    timeout_ms: source.timeout_ms ?? defaults.timeout_ms,
    render: source.render ?? defaults.render,
    cache_duration_hours: source.cache_duration_hours ?? defaults.cache_duration_hours,
    incremental: source.incremental ?? defaults.incremental,
  };
}
