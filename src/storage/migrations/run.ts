#!/usr/bin/env node

/**
 * Database migration runner
 */

import { config } from 'dotenv';
import { createStorage } from '../index.js';
import { logger } from '../../util/logger.js';

// Load environment variables
config();

async function main() {
  try {
    logger.info('Starting database migration');

    const storage = await createStorage();

    const isConnected = await storage.testConnection();
    if (!isConnected) {
      throw new Error('Database connection failed');
    }

    await storage.runMigrations();
    await storage.close();

    logger.info('Database migration completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error('Database migration failed', { error });
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
