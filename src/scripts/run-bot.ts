import dotenv from 'dotenv';
dotenv.config();

import { JobClassifier } from '../classifier/job-classifier';
import { loadConfig } from '../config';
import { loadSignalSets } from '../config/signals';
import { closePool, getPool } from '../db/client';
import { PostgresDedupStore } from '../db/dedup-store';
import { JobFilter, jobFilterOptionsFromConfig } from '../filters/job-filter';
import { JobPipeline, pipelineSettingsFromConfig } from '../services/job-pipeline';
import { CycleScheduler } from '../services/scheduler';
import { TelegramChannelPublisher } from '../services/telegram-publisher';
import { createJobSources } from '../sources';
import { HttpClient } from '../sources/http';
import { logger, parseLogLevel, setLogLevel } from '../utils/logger';

/**
 * Channel bot entry point.
 *   run-bot          poll sources every CHECK_INTERVAL seconds
 *   run-bot --once   run a single cycle and exit
 */
async function main(): Promise<void> {
  const once = process.argv.slice(2).includes('--once');

  const config = loadConfig();
  setLogLevel(parseLogLevel(process.env.LOG_LEVEL));
  const signals = loadSignalSets(config.signalsFile);

  const pool = getPool(config.databaseUrl);
  const store = new PostgresDedupStore(pool);
  await store.init();

  const http = new HttpClient({
    timeoutMs: config.requestTimeoutMs,
    maxAttempts: config.rateLimitMaxAttempts,
  });
  const sources = createJobSources(config, http);

  logger.info('Configuration loaded', {
    sources: sources.map(s => s.name),
    cycleIntervalSeconds: config.cycleIntervalSeconds,
    maxPostsPerCycle: config.maxPostsPerCycle,
    dedupRetentionDays: config.dedupRetentionDays,
    identityStrategy: config.identityStrategy,
    publishLevels: config.publishLevels,
    includeUnknownLevel: config.includeUnknownLevel,
  });

  if (sources.length === 0) {
    logger.warn('No job sources enabled! Check the ENABLE_* environment variables');
  }

  const pipeline = new JobPipeline({
    sources,
    classifier: new JobClassifier(signals),
    filter: new JobFilter(jobFilterOptionsFromConfig(config, signals.remoteKeywords)),
    store,
    publisher: new TelegramChannelPublisher(config.telegram),
    settings: pipelineSettingsFromConfig(config),
  });

  if (once) {
    const report = await pipeline.runCycle();
    await closePool();
    process.exit(report.errors.some(e => e.stage === 'publish') ? 1 : 0);
  }

  const scheduler = new CycleScheduler(pipeline, config.cycleIntervalSeconds * 1000);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await scheduler.stop();
      await closePool();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  scheduler.start();
}

main().catch(async error => {
  logger.error('Bot failed to start', error);
  await closePool().catch(closeError => logger.error('Failed to close database pool', closeError));
  process.exit(1);
});
