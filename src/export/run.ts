#!/usr/bin/env node

/**
 * Lead export runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { createStorage, isLeadTable, LEAD_TABLES } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { leadRowsToCSV } from '../util/csv.js';

// Load environment variables
config();

interface ExportArgs {
  table: string;
  hours: number;
  minScore?: number;
  out: string;
}

function parsePositive(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.error(`Error: ${flag} must be a positive number`);
    process.exit(1);
  }
  return parsed;
}

/**
 * Parse command line arguments
 */
function parseCliArgs(): ExportArgs {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      table: { type: 'string', short: 't' },
      hours: { type: 'string', default: '24' },
      'min-score': { type: 'string', short: 'm' },
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(`
Usage: npm run export -- --table <table> --out <file> [--hours 24] [--min-score 7]

Options:
  -t, --table <table>      Lead table (required): ${Object.values(LEAD_TABLES).join(', ')}
      --hours <hours>      Leads created within the last N hours (default: 24)
  -m, --min-score <score>  Only leads scoring at least this much
  -o, --out <file>         Output CSV file path (required)
  -h, --help               Show this help message

Examples:
  npm run export -- --table permit_leads --hours 24 --min-score 7 --out out/permits.csv
    `);
    process.exit(0);
  }

  if (!values.table || !isLeadTable(values.table)) {
    console.error(`Error: --table must be one of ${Object.values(LEAD_TABLES).join(', ')}`);
    process.exit(1);
  }

  if (!values.out) {
    console.error('Error: --out is required');
    process.exit(1);
  }

  return {
    table: values.table,
    hours: parsePositive(values.hours ?? '24', '--hours'),
    minScore: values['min-score'] ? parsePositive(values['min-score'], '--min-score') : undefined,
    out: values.out,
  };
}

async function main() {
  const args = parseCliArgs();

  try {
    logger.info('Starting lead export', { ...args });

    const storage = await createStorage();
    const rows = await storage.recent(args.table, args.hours, args.minScore);

    if (rows.length === 0) {
      logger.info('No leads found to export', { ...args });
      await storage.close();
      process.exit(0);
    }

    const csvContent = await leadRowsToCSV(rows);

    const outputPath = resolve(process.cwd(), args.out);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, csvContent, 'utf-8');

    const scores = rows.map(row => row.lead_score);
    logger.info('Lead export completed successfully', {
      table: args.table,
      leadsExported: rows.length,
      outputFile: outputPath,
      scoreStats: {
        min: Math.min(...scores),
        max: Math.max(...scores),
        avg: Math.round(scores.reduce((sum, score) => sum + score, 0) / scores.length),
      },
      stormAffected: rows.filter(row => row.storm_affected).length,
    });

    await storage.close();
    process.exit(0);
  } catch (error) {
    logger.error('Lead export failed', { error, ...args });
    process.exit(1);
  }
}

process.on('unhandledRejection', reason => {
  logger.error('Unhandled promise rejection', { error: reason });
  process.exit(1);
});

if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
