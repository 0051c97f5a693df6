import dotenv from 'dotenv';
dotenv.config();

import { closePool, getPool } from '../db/client';
import { PostgresDedupStore } from '../db/dedup-store';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Creates the posted_jobs table and its index
 */
async function migrate() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error('Missing required environment variable: DATABASE_URL');
    process.exit(1);
  }

  try {
    logger.info('Starting database migration...');

    await new PostgresDedupStore(getPool(databaseUrl)).init();
    await closePool();

    logger.info('Database migration completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exit(1);
  }
}

void migrate();
