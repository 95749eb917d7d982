/**
 * Extractor registry keyed by source type
 */

import { ListingExtractor } from './listing.js';
import { AssessorExtractor } from './assessor.js';
import { PermitExtractor } from './permit.js';
import { StormReportExtractor } from './storm.js';
import type { Extractor } from './types.js';
import type { SourceType } from '../types.js';

export type ExtractorRegistry = Record<SourceType, Extractor>;

export function createExtractorRegistry(overrides: Partial<ExtractorRegistry> = {}): ExtractorRegistry {
  return {
    listing: new ListingExtractor(),
    assessor: new AssessorExtractor(),
    permit: new PermitExtractor(),
    storm: new StormReportExtractor(),
    ...overrides,
  };
}

export { ListingExtractor, AssessorExtractor, PermitExtractor, StormReportExtractor };
export { isRoofingRelated } from './permit.js';
export { cityFromLocation } from './storm.js';
export { BaseExtractor, type Extractor, type ExtractionResult } from './types.js';
