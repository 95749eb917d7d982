#!/usr/bin/env node

/**
 * Pipeline runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { loadPipelineConfig, loadRegion, resolveApiKeys } from '../config/index.js';
import { createStorage } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { createPipeline, runPipeline } from './pipeline.js';
import { formatReport } from './report.js';
import type { Storage } from '../types.js';

// Load environment variables
config();

process.on('unhandledRejection', reason => {
  logger.error('Unhandled promise rejection', { error: reason });
  process.exit(1);
});

function parseCliArgs() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      config: { type: 'string', short: 'c', default: 'dfw' },
      sources: { type: 'string', short: 's' },
      'dry-run': { type: 'boolean', short: 'd', default: false },
      report: { type: 'string', short: 'r' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(`
Usage: npm run pipeline -- [options]

Options:
  -c, --config <name>     Pipeline config under configs/ (default: dfw)
  -s, --sources <names>   Comma-separated source names to run (default: all enabled)
  -d, --dry-run           Fetch, extract and score without writing leads
  -r, --report <file>     Also write the run report as JSON
  -h, --help              Show this help message

Environment:
  SCRAPER_API_KEYS        Comma-separated proxy API keys (or SCRAPER_API_KEY)
  DATABASE_URL            sqlite://path or postgres:// URL (default: sqlite://./data/leads.db)
  DAILY_LEAD_LIMIT        Overrides daily_limit
  STATE_DIR               Overrides state_dir
    `);
    process.exit(0);
  }

  return {
    config: values.config ?? 'dfw',
    sources: values.sources
      ? values.sources.split(',').map(name => name.trim()).filter(Boolean)
      : undefined,
    dryRun: values['dry-run'] ?? false,
    report: values.report,
  };
}

async function main() {
  const args = parseCliArgs();
  let storage: Storage | undefined;

  try {
    const pipelineConfig = loadPipelineConfig(args.config);
    const region = loadRegion(pipelineConfig.region);
    const apiKeys = resolveApiKeys();

    storage = await createStorage();
    const isConnected = await storage.testConnection();
    if (!isConnected) {
      throw new Error('Database connection failed');
    }

    const deps = await createPipeline(pipelineConfig, region, {
      apiKeys,
      storage,
      sourceNames: args.sources,
    });

    logger.info('Pipeline configured', {
      config: pipelineConfig.name,
      region: region.name,
      sources: deps.sources.length,
      apiKeys: apiKeys.length,
      dailyLimit: pipelineConfig.daily_limit,
    });

    const report = await runPipeline(deps, { dryRun: args.dryRun });
    console.log(formatReport(report));

    if (args.report) {
      const reportPath = resolve(process.cwd(), args.report);
      mkdirSync(dirname(reportPath), { recursive: true });
      writeFileSync(reportPath, JSON.stringify(report, null, 2), 'utf-8');
      logger.info('Run report written', { path: reportPath });
    }
    logger.info('Pipeline run completed', {
      inserted: report.totals.inserted,
      duplicates: report.totals.duplicates,
      rejectedDailyLimit: report.totals.rejectedDailyLimit,
      storageErrors: report.totals.storageErrors,
      durationMs: report.durationMs,
    });

    await storage.close();
    process.exit(0);
  } catch (error) {
    logger.error('Pipeline failed to start', { error });
    if (storage) {
      await storage.close().catch((closeError: unknown) => {
        logger.warn('Failed to close storage', { error: closeError });
      });
    }
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
