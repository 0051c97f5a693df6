import type { JobClassifier } from '../classifier/job-classifier';
import type { Config } from '../config';
import type { DedupStore } from '../db/dedup-store';
import type { JobFilter } from '../filters/job-filter';
import type { JobSource } from '../sources/base';
import type { ClassifiedJob, JobLevel, JobRecord } from '../types/job';
import { PublishError, errorMessage, toPipelineError } from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep as defaultSleep, type SleepFunction } from '../utils/sleep';
import { formatJobMessage } from './message-formatter';
import type { JobPublisher } from './telegram-publisher';

export type PipelineStage =
  | 'IDLE'
  | 'FETCHING'
  | 'CLASSIFYING'
  | 'DEDUPING'
  | 'CAPPING'
  | 'PUBLISHING'
  | 'DONE';

export type CycleErrorStage = 'expire' | 'fetch' | 'dedup' | 'publish' | 'mark';

export interface CycleError {
  stage: CycleErrorStage;
  kind: string;
  message: string;
  source?: string;
  identity?: string;
  retryable?: boolean;
}

export interface SourceReport {
  status: 'ok' | 'failed';
  fetched: number;
  skipped: number;
  error?: string;
}

export interface CycleReport {
  status: 'completed' | 'skipped';
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  expired: number;
  fetched: number;
  relevant: number;
  filteredOut: number;
  alreadySeen: number;
  novel: number;
  selected: number;
  published: number;
  failedPublishes: number;
  /** Permanently rejected jobs, marked seen so they are not attempted again */
  dropped: number;
  levels: Record<JobLevel, number>;
  sources: Record<string, SourceReport>;
  errors: CycleError[];
}

export interface PipelineSettings {
  maxPostsPerCycle: number;
  dedupRetentionMs: number;
  interSourceDelayMs: number;
  sourceJitterMs: number;
  betweenPostsDelayMs: number;
  markSeenAttempts: number;
  markSeenBackoffMs: number;
}

export interface PipelineDependencies {
  sources: JobSource[];
  classifier: JobClassifier;
  filter: JobFilter;
  store: DedupStore;
  publisher: JobPublisher;
  settings: PipelineSettings;
  formatMessage?: (job: ClassifiedJob) => string;
  sleep?: SleepFunction;
  random?: () => number;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function pipelineSettingsFromConfig(config: Config): PipelineSettings {
  return {
    maxPostsPerCycle: config.maxPostsPerCycle,
    dedupRetentionMs: config.dedupRetentionDays * DAY_MS,
    interSourceDelayMs: config.interSourceDelayMs,
    sourceJitterMs: config.sourceJitterMs,
    betweenPostsDelayMs: config.betweenPostsDelayMs,
    markSeenAttempts: 3,
    markSeenBackoffMs: 1000,
  };
}

function createReport(startedAt: Date, status: CycleReport['status']): CycleReport {
  return {
    status,
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    expired: 0,
    fetched: 0,
    relevant: 0,
    filteredOut: 0,
    alreadySeen: 0,
    novel: 0,
    selected: 0,
    published: 0,
    failedPublishes: 0,
    dropped: 0,
    levels: { Junior: 0, Middle: 0, Senior: 0, Unknown: 0 },
    sources: {},
    errors: [],
  };
}

/**
 * Runs one ingestion cycle: fetch → classify → dedup → cap → publish.
 *
 * A job is marked seen only after the publisher accepted it, so a failed
 * post is retried next cycle and a published one is never posted again
 * while the store is reachable. A job the publisher rejects permanently
 * is marked seen as well and dropped.
 */
export class JobPipeline {
  private readonly sources: JobSource[];
  private readonly classifier: JobClassifier;
  private readonly filter: JobFilter;
  private readonly store: DedupStore;
  private readonly publisher: JobPublisher;
  private readonly settings: PipelineSettings;
  private readonly formatMessage: (job: ClassifiedJob) => string;
  private readonly sleep: SleepFunction;
  private readonly random: () => number;
  private readonly now: () => Date;

  private running = false;
  private currentStage: PipelineStage = 'IDLE';

  constructor(deps: PipelineDependencies) {
    this.sources = deps.sources;
    this.classifier = deps.classifier;
    this.filter = deps.filter;
    this.store = deps.store;
    this.publisher = deps.publisher;
    this.settings = deps.settings;
    this.formatMessage = deps.formatMessage ?? formatJobMessage;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  get stage(): PipelineStage {
    return this.currentStage;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runCycle(): Promise<CycleReport> {
    if (this.running) {
      logger.warn('Cycle already in progress, skipping');
      return createReport(this.now(), 'skipped');
    }

    this.running = true;
    try {
      return await this.executeCycle();
    } finally {
      this.running = false;
    }
  }

  private setStage(stage: PipelineStage): void {
    this.currentStage = stage;
    logger.debug(`Pipeline stage: ${stage}`);
  }

  private async executeCycle(): Promise<CycleReport> {
    const report = createReport(this.now(), 'completed');
    logger.info('Cycle started', { sources: this.sources.map(s => s.name) });

    await this.expireEntries(report);

    this.setStage('FETCHING');
    const fetched = await this.fetchAll(report);
    report.fetched = fetched.length;

    this.setStage('CLASSIFYING');
    const relevant: ClassifiedJob[] = [];
    for (const job of fetched) {
      const classification = this.classifier.classify(job);
      if (classification.isRelevant) {
        relevant.push({ job, classification });
      }
    }
    report.relevant = relevant.length;

    const candidates = this.filter.filter(relevant);
    report.filteredOut = relevant.length - candidates.length;

    this.setStage('DEDUPING');
    const novel = await this.selectNovel(candidates, report);
    report.novel = novel.length;

    this.setStage('CAPPING');
    const selected = novel.slice(0, this.settings.maxPostsPerCycle);
    report.selected = selected.length;
    if (novel.length > selected.length) {
      logger.info(`Capped ${novel.length} novel jobs to ${selected.length}`);
    }

    this.setStage('PUBLISHING');
    await this.publishAll(selected, report);

    this.setStage('DONE');
    report.finishedAt = this.now();
    report.durationMs = report.finishedAt.getTime() - report.startedAt.getTime();

    logger.info('Cycle completed', {
      durationMs: report.durationMs,
      fetched: report.fetched,
      relevant: report.relevant,
      filteredOut: report.filteredOut,
      alreadySeen: report.alreadySeen,
      novel: report.novel,
      published: report.published,
      failedPublishes: report.failedPublishes,
      dropped: report.dropped,
      errors: report.errors.length,
    });

    return report;
  }

  private async expireEntries(report: CycleReport): Promise<void> {
    try {
      report.expired = await this.store.expireOlderThan(this.settings.dedupRetentionMs, report.startedAt);
    } catch (error) {
      const err = toPipelineError(error);
      logger.warn('Dedup expiry failed, continuing', { error: err.message });
      report.errors.push({ stage: 'expire', kind: err.name, message: err.message });
    }
  }

  private interSourceDelay(): number {
    return this.settings.interSourceDelayMs + Math.round(this.random() * this.settings.sourceJitterMs);
  }

  /**
   * Sources run one at a time with a politeness delay between them;
   * a failing source is recorded and skipped
   */
  private async fetchAll(report: CycleReport): Promise<JobRecord[]> {
    const jobs: JobRecord[] = [];

    for (const [index, source] of this.sources.entries()) {
      if (index > 0) {
        const delay = this.interSourceDelay();
        if (delay > 0) await this.sleep(delay);
      }

      try {
        const result = await source.fetchJobs();
        jobs.push(...result.jobs);
        report.sources[source.name] = {
          status: 'ok',
          fetched: result.jobs.length,
          skipped: result.skipped,
        };
        logger.info(`Source ${source.name} completed`, {
          fetched: result.jobs.length,
          skipped: result.skipped,
        });
      } catch (error) {
        const err = toPipelineError(error, { source: source.name });
        report.sources[source.name] = { status: 'failed', fetched: 0, skipped: 0, error: err.message };
        report.errors.push({ stage: 'fetch', kind: err.name, message: err.message, source: source.name });
        logger.error(`Source ${source.name} failed`, err);
      }
    }

    return jobs;
  }

  private async selectNovel(candidates: ClassifiedJob[], report: CycleReport): Promise<ClassifiedJob[]> {
    const accepted = new Set<string>();
    const novel: ClassifiedJob[] = [];

    for (const candidate of candidates) {
      const { identity } = candidate.job;
      if (accepted.has(identity)) {
        report.alreadySeen++;
        continue;
      }

      let seen = false;
      try {
        seen = await this.store.hasSeen(identity);
      } catch (error) {
        // Possible duplicate post is preferred over dropping a new listing
        const err = toPipelineError(error);
        logger.warn('Dedup lookup failed, treating job as not seen', {
          identity,
          title: candidate.job.title,
          error: err.message,
        });
        report.errors.push({ stage: 'dedup', kind: err.name, message: err.message, identity });
      }

      if (seen) {
        report.alreadySeen++;
        continue;
      }

      accepted.add(identity);
      novel.push(candidate);
    }

    return novel;
  }

  private async publishAll(selected: ClassifiedJob[], report: CycleReport): Promise<void> {
    for (const [index, candidate] of selected.entries()) {
      const { job, classification } = candidate;

      try {
        await this.publisher.publish(this.formatMessage(candidate));
      } catch (error) {
        const err = error instanceof PublishError ? error : new PublishError(errorMessage(error), true);
        report.failedPublishes++;
        report.errors.push({
          stage: 'publish',
          kind: err.name,
          message: err.message,
          source: job.sourceName,
          identity: job.identity,
          retryable: err.retryable,
        });
        logger.error(`Failed to publish job`, err, {
          title: job.title,
          source: job.sourceName,
          retryable: err.retryable,
        });

        if (!err.retryable) {
          report.dropped++;
          await this.markSeenWithRetry(candidate, report);
        }
        continue;
      }

      report.published++;
      report.levels[classification.level]++;
      await this.markSeenWithRetry(candidate, report);

      if (index < selected.length - 1 && this.settings.betweenPostsDelayMs > 0) {
        await this.sleep(this.settings.betweenPostsDelayMs);
      }
    }
  }

  private async markSeenWithRetry({ job, classification }: ClassifiedJob, report: CycleReport): Promise<void> {
    const attempts = Math.max(1, this.settings.markSeenAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.store.markSeen(job.identity, this.now(), {
          title: job.title,
          company: job.company,
          level: classification.level,
          sourceName: job.sourceName,
        });
        return;
      } catch (error) {
        const err = toPipelineError(error);

        if (attempt < attempts) {
          logger.warn(`Marking job as seen failed, retrying`, { attempt, identity: job.identity });
          await this.sleep(this.settings.markSeenBackoffMs * attempt);
          continue;
        }

        logger.error('Could not mark job as seen; it will be attempted again next cycle', err, {
          identity: job.identity,
          title: job.title,
        });
        report.errors.push({
          stage: 'mark',
          kind: err.name,
          message: err.message,
          source: job.sourceName,
          identity: job.identity,
        });
      }
    }
  }
}
