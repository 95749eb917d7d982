/**
 * Run report types and formatting
 */

import type { FetchStats } from '../fetch/client.js';
import type { GovernorStats } from '../governor/daily-governor.js';
import type { SourceType } from '../types.js';

export interface SourceCounters {
  urls: number;
  cacheHits: number;
  requests: number;
  fetched: number;
  fetchFailures: number;
  extractionFailures: number;
  urlErrors: number;
  recordsExtracted: number;
  inRegion: number;
  outOfRegion: number;
  // in-region leads by the rule that matched them
  matchedByCounty: number;
  matchedByPostalCode: number;
  matchedByCity: number;
  stormFlagged: number;
  inserted: number;
  duplicates: number;
  rejectedDailyLimit: number;
  storageErrors: number;
}

export interface SourceReport extends SourceCounters {
  name: string;
  type: SourceType;
  durationMs: number;
  fetch: FetchStats;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dryRun: boolean;
  sources: SourceReport[];
  totals: SourceCounters;
  // cache hits / urls, 0 when there were no urls
  cacheHitRate: number;
  stormEvents: number;
  governor: GovernorStats;
}

const COUNTER_KEYS = [
  'urls',
  'cacheHits',
  'requests',
  'fetched',
  'fetchFailures',
  'extractionFailures',
  'urlErrors',
  'recordsExtracted',
  'inRegion',
  'outOfRegion',
  'matchedByCounty',
  'matchedByPostalCode',
  'matchedByCity',
  'stormFlagged',
  'inserted',
  'duplicates',
  'rejectedDailyLimit',
  'storageErrors',
] as const satisfies ReadonlyArray<keyof SourceCounters>;

export function emptyCounters(): SourceCounters {
  return {
    urls: 0,
    cacheHits: 0,
    requests: 0,
    fetched: 0,
    fetchFailures: 0,
    extractionFailures: 0,
    urlErrors: 0,
    recordsExtracted: 0,
    inRegion: 0,
    outOfRegion: 0,
    matchedByCounty: 0,
    matchedByPostalCode: 0,
    matchedByCity: 0,
    stormFlagged: 0,
    inserted: 0,
    duplicates: 0,
    rejectedDailyLimit: 0,
    storageErrors: 0,
  };
}

export function sumCounters(reports: readonly SourceCounters[]): SourceCounters {
  const totals = emptyCounters();
  for (const report of reports) {
    for (const key of COUNTER_KEYS) {
      totals[key] += report[key];
    }
  }
  return totals;
}

export function cacheHitRate(counters: Pick<SourceCounters, 'urls' | 'cacheHits'>): number {
  return counters.urls === 0 ? 0 : counters.cacheHits / counters.urls;
}

/**
 * Human-readable summary, one line per source
 */
export function formatReport(report: RunReport): string {
  const lines = [
    `Run ${report.dryRun ? '(dry run) ' : ''}finished in ${(report.durationMs / 1000).toFixed(1)}s`,
    `Governor: ${report.governor.total}/${report.governor.limit} in-region leads on ${report.governor.date} (${report.governor.state})`,
  ];

  for (const source of report.sources) {
    lines.push(
      `  ${source.name.padEnd(20)} urls=${source.urls} cached=${source.cacheHits} fetched=${source.fetched} ` +
        `failed=${source.fetchFailures} records=${source.recordsExtracted} in=${source.inRegion} ` +
        `inserted=${source.inserted} dup=${source.duplicates} capped=${source.rejectedDailyLimit} ` +
        `errors=${source.storageErrors}`
    );
  }

  const totals = report.totals;
  lines.push(
    `  ${'TOTAL'.padEnd(20)} urls=${totals.urls} cached=${totals.cacheHits} fetched=${totals.fetched} ` +
      `failed=${totals.fetchFailures} records=${totals.recordsExtracted} in=${totals.inRegion} ` +
      `inserted=${totals.inserted} dup=${totals.duplicates} capped=${totals.rejectedDailyLimit} ` +
      `errors=${totals.storageErrors} hit-rate=${(report.cacheHitRate * 100).toFixed(1)}%`
  );
  lines.push(
    `Region matches: county=${totals.matchedByCounty} postal_code=${totals.matchedByPostalCode} city=${totals.matchedByCity}`
  );

  const accepted = Object.entries(report.governor.bySource);
  if (accepted.length > 0) {
    lines.push(`Accepted today: ${accepted.map(([source, count]) => `${source}=${count}`).join(' ')}`);
  }
  const allocation = Object.entries(report.governor.allocation);
  if (allocation.length > 0) {
    lines.push(`Remaining allocation: ${allocation.map(([source, count]) => `${source}=${count}`).join(' ')}`);
  }

  return lines.join('\n');
}
