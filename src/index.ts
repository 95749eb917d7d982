/**
 * Public API of the roof-leads pipeline
 */

export * from './types.js';
export {
  SOURCE_TYPES,
  STORM_EVENT_TYPES,
  ExtractedRecordSchema,
  ListingRecordSchema,
  AssessorRecordSchema,
  PermitRecordSchema,
  StormRecordSchema,
} from './records.js';

export {
  loadPipelineConfig,
  loadRegion,
  resolveApiKeys,
  resolveSource,
  getAvailableConfigs,
  type PipelineConfig,
  type SourceConfig,
  type ResolvedSourceConfig,
  type Region,
} from './config/index.js';

export { ApiKeyPool } from './fetch/key-pool.js';
export { SlidingWindowLimiter } from './fetch/rate-limiter.js';
export { ProxyFetchClient, type FetchClientOptions, type FetchStats, type HttpTransport } from './fetch/client.js';
export { FetchCache, type CacheEntry } from './cache/fetch-cache.js';
export * from './extractors/index.js';
export { RegionFilter, type RegionClassification } from './geo/region-filter.js';
export { LeadScorer, type ScoreOptions } from './score/scorer.js';
export { DEFAULT_SCORING_WEIGHTS, ScoringWeightsSchema, type ScoringWeights } from './score/weights.js';
export { StormExposureIndex } from './storm/exposure-index.js';
export {
  DailyVolumeGovernor,
  FileCounterStore,
  MemoryCounterStore,
  type CounterStore,
  type GovernorStats,
  type Reservation,
} from './governor/daily-governor.js';
export { createStorage, SqliteStorage, PersistenceGateway } from './storage/index.js';
export { identityHash, contentHash } from './util/hash.js';
export { createPipeline, runPipeline, type PipelineDeps, type PipelineOptions } from './orchestrate/pipeline.js';
export { generateUrls } from './orchestrate/sources.js';
export { formatReport, type RunReport, type SourceReport } from './orchestrate/report.js';
