import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PipelineConfigSchema } from '../../src/config/schema.js';
import type { Region } from '../../src/config/region.js';
import type { HttpTransport } from '../../src/fetch/client.js';
import { createExtractorRegistry, type Extractor } from '../../src/extractors/index.js';
import { createPipeline, runPipeline } from '../../src/orchestrate/pipeline.js';
import { formatReport } from '../../src/orchestrate/report.js';
import { SqliteStorage } from '../../src/storage/sqlite.js';

const STORM_CSV = [
  'Time,Size,Location,County,State,Lat,Lon,Comments',
  '1800,200,1 N PLANO,COLLIN,TX,33.03,-96.70,Hail (FWD)',
].join('\n');

const CAD_HTML = `
  <table class="property-results">
    <thead><tr><th>Account #</th><th>Property Address</th><th>Market Value</th><th>Year Built</th></tr></thead>
    <tbody>
      <tr><td>R-1</td><td>4521 Preston Rd, Plano, TX 75024</td><td>$450,000</td><td>2009</td></tr>
      <tr><td>R-2</td><td>100 Congress Ave, Austin, TX 78701</td><td>$380,000</td><td>1995</td></tr>
    </tbody>
  </table>`;

const region: Region = {
  name: 'test',
  counties: ['collin', 'dallas'],
  postal_codes: ['75024'],
  cities: ['plano'],
  premium_postal_codes: ['75024'],
  premium_cities: ['plano'],
  standard_cities: ['dallas'],
};

const config = PipelineConfigSchema.parse({
  name: 'test',
  region: 'test',
  daily_limit: 100,
  defaults: { retry_attempts: 2 },
  sources: [
    {
      name: 'cad',
      type: 'assessor',
      urls: ['https://cad.test/search?zip=75024'],
    },
    {
      name: 'permits',
      type: 'permit',
      urls: ['https://permits.test/search?city=plano'],
    },
    {
      name: 'storms',
      type: 'storm',
      url_templates: ['https://storm.test/{date}_rpts_filtered.csv'],
      date_offsets_days: [1],
    },
  ],
});

const transport: HttpTransport = async url => {
  const target = new URL(url).searchParams.get('url') ?? '';
  if (target === 'https://storm.test/240614_rpts_filtered.csv') {
    return { ok: true, status: 200, text: async () => STORM_CSV };
  }
  if (target.startsWith('https://cad.test/')) {
    return { ok: true, status: 200, text: async () => CAD_HTML };
  }
  return { ok: false, status: 500, text: async () => 'error' };
};

const now = () => new Date(2024, 5, 15, 9);

describe('runPipeline', () => {
  let storage: SqliteStorage;

  beforeEach(async () => {
    storage = new SqliteStorage(':memory:');
    await storage.runMigrations();
  });

  afterEach(async () => {
    await storage.close();
  });

  function setup(sourceNames?: string[]) {
    return createPipeline(config, region, {
      apiKeys: ['test-key-1'],
      storage,
      sourceNames,
      transport,
      stateDir: null,
      sleep: async () => undefined,
      now,
    });
  }

  it('should run storms first, flag exposed properties and persist leads', async () => {
    const deps = await setup();
    const report = await runPipeline(deps);

    expect(report.sources.map(source => source.name)).toEqual(['storms', 'cad', 'permits']);

    const [storms, cad, permits] = report.sources;
    expect(storms).toMatchObject({ urls: 1, fetched: 1, recordsExtracted: 1, inRegion: 1, inserted: 1 });
    expect(cad).toMatchObject({
      urls: 1,
      fetched: 1,
      recordsExtracted: 2,
      inRegion: 1,
      outOfRegion: 1,
      stormFlagged: 1,
      inserted: 2,
    });
    expect(permits).toMatchObject({ urls: 1, requests: 2, fetched: 0, fetchFailures: 1, inserted: 0 });

    expect(report.totals).toMatchObject({ urls: 3, fetched: 2, fetchFailures: 1, inserted: 3, duplicates: 0 });
    expect(report.stormEvents).toBe(1);
    expect(report.governor).toMatchObject({ date: '2024-06-15', total: 2, bySource: { storms: 1, cad: 1 } });
    expect(report.governor.allocation).toEqual({ cad: 33, permits: 33, storms: 32 });
    expect(storms).toMatchObject({ matchedByCounty: 1, matchedByPostalCode: 0, matchedByCity: 0 });
    expect(cad).toMatchObject({ matchedByCounty: 0, matchedByPostalCode: 1, matchedByCity: 0 });

    const rows = await storage.recent('assessor_leads', 24 * 365 * 100);
    const exposed = rows.find(row => row.details.accountNumber === 'R-1');
    expect(exposed).toMatchObject({ lead_score: 10, in_region: true, region_match: 'postal_code', storm_affected: true });
    expect(exposed?.score_breakdown.storm).toBe(2);
    expect(await storage.count('storm_events')).toBe(1);

    const lines = formatReport(report).split('\n');
    expect(lines[1]).toBe('Governor: 2/100 in-region leads on 2024-06-15 (OPEN)');
    expect(lines.slice(6)).toEqual([
      'Region matches: county=1 postal_code=1 city=0',
      'Accepted today: storms=1 cad=1',
      'Remaining allocation: cad=33 permits=33 storms=32',
    ]);
  });

  it('should reuse cached batches on the next run', async () => {
    const deps = await setup();
    await runPipeline(deps);
    const second = await runPipeline(deps);

    expect(second.totals).toMatchObject({ cacheHits: 2, fetched: 0, fetchFailures: 1, inserted: 0, duplicates: 3 });
    expect(second.cacheHitRate).toBeCloseTo(2 / 3);
    expect(await storage.count('assessor_leads')).toBe(2);
  });

  it('should score without writing on a dry run', async () => {
    const deps = await setup(['cad']);
    const report = await runPipeline(deps, { dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.totals).toMatchObject({ recordsExtracted: 2, inRegion: 1, inserted: 0 });
    expect(await storage.count('assessor_leads')).toBe(0);
  });

  it('should count extraction failures and carry on', async () => {
    const broken: Extractor = {
      sourceType: 'assessor',
      extract: () => [],
      tryExtract: () => ({ records: [], error: 'unexpected markup' }),
    };
    const deps = await setup(['cad', 'storms']);
    const report = await runPipeline({ ...deps, extractors: createExtractorRegistry({ assessor: broken }) });

    expect(report.sources.find(source => source.name === 'cad')).toMatchObject({
      fetched: 1,
      extractionFailures: 1,
      recordsExtracted: 0,
    });
    expect(report.totals.inserted).toBe(1);
  });

  it('should reject unknown source names', async () => {
    await expect(setup(['nope'])).rejects.toThrow('Unknown sources: nope');
  });
});
