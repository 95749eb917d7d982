/**
 * Pipeline orchestration
 *
 * Storm sources run first so the exposure index is populated before any
 * property, listing or permit record is scored. The remaining sources then
 * run in parallel, each behind its own fetch client limits.
 */

import { resolve } from 'path';
import { performance } from 'perf_hooks';
import { resolveSource, type PipelineConfig, type ResolvedSourceConfig } from '../config/schema.js';
import type { Region } from '../config/region.js';
import { ApiKeyPool } from '../fetch/key-pool.js';
import { ProxyFetchClient, type FetchStats, type HttpTransport } from '../fetch/client.js';
import { FetchCache, contentHash } from '../cache/fetch-cache.js';
import { createExtractorRegistry, type ExtractorRegistry } from '../extractors/index.js';
import { RegionFilter } from '../geo/region-filter.js';
import { LeadScorer } from '../score/scorer.js';
import { StormExposureIndex } from '../storm/exposure-index.js';
import {
  DailyVolumeGovernor,
  FileCounterStore,
  MemoryCounterStore,
} from '../governor/daily-governor.js';
import { PersistenceGateway } from '../storage/gateway.js';
import { identityHash } from '../util/hash.js';
import { logger as defaultLogger } from '../util/logger.js';
import { cacheHitRate, emptyCounters, sumCounters, type RunReport, type SourceReport } from './report.js';
import { generateUrls } from './sources.js';
import type { ExtractedRecord, FetchResult, Lead, Logger, StormRecord, Storage } from '../types.js';

/**
 * What the orchestrator needs from a fetch client
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
  stats(): FetchStats;
}

export interface SourceRuntime {
  config: ResolvedSourceConfig;
  client: PageFetcher;
  cache: FetchCache;
}

export interface PipelineDeps {
  sources: SourceRuntime[];
  extractors: ExtractorRegistry;
  scorer: LeadScorer;
  regionFilter: RegionFilter;
  exposureIndex: StormExposureIndex;
  governor: DailyVolumeGovernor;
  gateway: PersistenceGateway;
  now?: () => Date;
  logger?: Logger;
}

export interface PipelineOptions {
  // score and classify but write nothing
  dryRun?: boolean;
}

export interface CreatePipelineOptions {
  apiKeys: readonly string[];
  storage: Storage;
  // restrict the run to these source names
  sourceNames?: readonly string[];
  transport?: HttpTransport;
  // null keeps the cache and governor counter in memory
  stateDir?: string | null;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Wire every component from a validated config, restoring the fetch caches
 * and today's governor counter from the state directory
 */
export async function createPipeline(
  config: PipelineConfig,
  region: Region,
  options: CreatePipelineOptions
): Promise<PipelineDeps> {
  const log = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const stateDir = options.stateDir === undefined ? resolve(process.cwd(), config.state_dir) : options.stateDir;

  const selected = config.sources.filter(source =>
    source.enabled && (!options.sourceNames || options.sourceNames.includes(source.name))
  );
  if (options.sourceNames) {
    const known = new Set(config.sources.map(source => source.name));
    const unknown = options.sourceNames.filter(name => !known.has(name));
    if (unknown.length > 0) {
      throw new Error(`Unknown sources: ${unknown.join(', ')}`);
    }
  }

  const keys = new ApiKeyPool(options.apiKeys);
  const sources: SourceRuntime[] = [];
  for (const source of selected) {
    const resolved = resolveSource(config, source);
    const cache = new FetchCache({
      source: resolved.name,
      cacheDurationHours: resolved.cache_duration_hours,
      incremental: resolved.incremental,
      stateDir,
      now: () => now().getTime(),
      logger: log,
    });
    await cache.load();

    const client = new ProxyFetchClient({
      keys,
      endpoint: config.proxy.endpoint,
      maxConcurrent: resolved.max_concurrent,
      requestsPerHour: resolved.requests_per_hour,
      retryAttempts: resolved.retry_attempts,
      retryBackoffMs: resolved.retry_backoff_ms,
      jitterFactor: resolved.jitter_factor,
      timeoutMs: resolved.timeout_ms,
      render: resolved.render,
      transport: options.transport,
      sleep: options.sleep,
      now: () => now().getTime(),
      logger: log,
    });

    sources.push({ config: resolved, client, cache });
  }

  const governor = new DailyVolumeGovernor({
    limit: config.daily_limit,
    sources: selected.map(source => source.name),
    store: stateDir
      ? new FileCounterStore(resolve(stateDir, 'daily-counter.json'), log)
      : new MemoryCounterStore(),
    now,
    logger: log,
  });
  await governor.load();

  return {
    sources,
    extractors: createExtractorRegistry(),
    scorer: new LeadScorer({
      weights: config.scoring,
      premiumPostalCodes: region.premium_postal_codes,
      premiumCities: region.premium_cities,
      standardCities: region.standard_cities,
    }),
    regionFilter: new RegionFilter(region),
    exposureIndex: new StormExposureIndex({ lookbackDays: config.storm_lookback_days }),
    governor,
    gateway: new PersistenceGateway({ storage: options.storage, governor, logger: log }),
    now,
    logger: log,
  };
}

/**
 * Run every source once and report what happened
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions = {}): Promise<RunReport> {
  const log = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  const dryRun = options.dryRun ?? false;
  const startedAt = now();
  const start = performance.now();

  const stormSources = deps.sources.filter(source => source.config.type === 'storm');
  const otherSources = deps.sources.filter(source => source.config.type !== 'storm');

  log.info('Starting pipeline run', {
    sources: deps.sources.map(source => source.config.name),
    dryRun,
  });

  const stormReports = await Promise.all(stormSources.map(source => runSource(source, deps, dryRun, log, now)));
  if (stormSources.length > 0) {
    log.info('Storm phase complete', { stormEvents: deps.exposureIndex.size });
  }
  const otherReports = await Promise.all(otherSources.map(source => runSource(source, deps, dryRun, log, now)));

  const sources = [...stormReports, ...otherReports];
  const totals = sumCounters(sources);

  return {
    startedAt: startedAt.toISOString(),
    finishedAt: now().toISOString(),
    durationMs: Math.round(performance.now() - start),
    dryRun,
    sources,
    totals,
    cacheHitRate: cacheHitRate(totals),
    stormEvents: deps.exposureIndex.size,
    governor: deps.governor.stats(),
  };
}

async function runSource(
  source: SourceRuntime,
  deps: PipelineDeps,
  dryRun: boolean,
  log: Logger,
  now: () => Date
): Promise<SourceReport> {
  const start = performance.now();
  const asOf = now();
  const urls = generateUrls(source.config, asOf);
  const report: SourceReport = {
    name: source.config.name,
    type: source.config.type,
    ...emptyCounters(),
    urls: urls.length,
    durationMs: 0,
    fetch: source.client.stats(),
  };

  log.info('Processing source', { source: report.name, type: report.type, urls: urls.length });

  await Promise.all(urls.map(async url => {
    try {
      await processUrl(url, source, deps, report, dryRun, asOf, log, now);
    } catch (error) {
      report.urlErrors++;
      log.error('URL processing failed', {
        source: report.name,
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }));

  try {
    await source.cache.save();
  } catch (error) {
    log.error('Failed to save fetch cache', {
      source: report.name,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  report.fetch = source.client.stats();
  report.durationMs = Math.round(performance.now() - start);
  log.info('Source complete', {
    source: report.name,
    fetched: report.fetched,
    cacheHits: report.cacheHits,
    records: report.recordsExtracted,
    inserted: report.inserted,
    durationMs: report.durationMs,
  });
  return report;
}

async function processUrl(
  url: string,
  source: SourceRuntime,
  deps: PipelineDeps,
  report: SourceReport,
  dryRun: boolean,
  asOf: Date,
  log: Logger,
  now: () => Date
): Promise<void> {
  const records = await recordsFor(url, source, deps, report, log, now);
  if (!records) {
    return;
  }
  report.recordsExtracted += records.length;

  if (source.config.type === 'storm') {
    deps.exposureIndex.add(records.filter(isStormRecord));
  }

  const leads = records.map(record => toLead(record, source.config, deps, asOf));
  for (const lead of leads) {
    if (lead.inRegion) {
      report.inRegion++;
    } else {
      report.outOfRegion++;
    }
    if (lead.stormExposure) {
      report.stormFlagged++;
    }
    switch (lead.regionMatch) {
      case 'county':
        report.matchedByCounty++;
        break;
      case 'postal_code':
        report.matchedByPostalCode++;
        break;
      case 'city':
        report.matchedByCity++;
        break;
    }
  }

  if (dryRun) {
    return;
  }

  const outcomes = await Promise.all(leads.map(lead => deps.gateway.persist(lead, source.config.name)));
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'inserted':
        report.inserted++;
        break;
      case 'duplicate':
        report.duplicates++;
        break;
      case 'rejected':
        if (outcome.reason === 'daily_limit') {
          report.rejectedDailyLimit++;
        } else {
          report.storageErrors++;
        }
        break;
    }
  }
}

/**
 * Cached batch when fresh, otherwise fetch and extract. Undefined when the
 * fetch or the extraction failed.
 */
async function recordsFor(
  url: string,
  source: SourceRuntime,
  deps: PipelineDeps,
  report: SourceReport,
  log: Logger,
  now: () => Date
): Promise<ExtractedRecord[] | undefined> {
  if (!source.cache.shouldFetch(url)) {
    const cached = source.cache.get(url);
    if (cached) {
      report.cacheHits++;
      log.debug('Cache hit', { source: report.name, url });
      return cached.records;
    }
  }

  const result = await source.client.fetch(url);
  report.requests += result.attempts;
  if (!result.success || result.body === undefined) {
    report.fetchFailures++;
    log.warn('Fetch failed', {
      source: report.name,
      url,
      status: result.status,
      attempts: result.attempts,
      error: result.error,
    });
    return undefined;
  }
  report.fetched++;

  const extractor = deps.extractors[source.config.type];
  const extraction = extractor.tryExtract(result.body, url, now().toISOString());
  if (extraction.error) {
    report.extractionFailures++;
    log.warn('Extraction failed', { source: report.name, url, error: extraction.error });
    return undefined;
  }

  source.cache.record(url, contentHash(result.body), extraction.records);
  return extraction.records;
}

function toLead(record: ExtractedRecord, config: ResolvedSourceConfig, deps: PipelineDeps, asOf: Date): Lead {
  const flagged = deps.exposureIndex.flag(record, asOf);
  const region = deps.regionFilter.classify(flagged);
  const breakdown = deps.scorer.explain(flagged, {
    asOf,
    prior: config.prior,
    valueTiers: config.value_tiers,
  });

  return {
    ...flagged,
    identityHash: identityHash(flagged),
    leadScore: breakdown.total,
    inRegion: region.inRegion,
    regionMatch: region.matchedBy,
    scoreBreakdown: breakdown,
  };
}

function isStormRecord(record: ExtractedRecord): record is StormRecord {
  return record.sourceType === 'storm';
}
