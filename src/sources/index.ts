import type { Config } from '../config';
import { logger } from '../utils/logger';
import { AdzunaSource } from './adzuna';
import type { JobSource, JobSourceOptions } from './base';
import { HeadHunterSource } from './headhunter';
import type { HttpClient } from './http';
import { JobicySource } from './jobicy';
import { RemoteOKSource } from './remoteok';
import { RemotiveSource } from './remotive';
import { SuperJobSource } from './superjob';
import { WeWorkRemotelySource } from './weworkremotely';

export type { JobSource, SourceFetchResult } from './base';

/**
 * Factory function to create enabled job sources based on configuration.
 * Order here is the order sources are polled in, and therefore the order
 * in which listings compete for the per-cycle cap.
 */
export function createJobSources(config: Config, http: HttpClient): JobSource[] {
  const options: JobSourceOptions = {
    http,
    identityStrategy: config.identityStrategy,
    maxJobs: config.maxJobsPerSource,
  };
  const sources: JobSource[] = [];

  if (config.enableRemoteOK) {
    sources.push(new RemoteOKSource(options));
  }

  if (config.enableRemotive) {
    sources.push(new RemotiveSource(options));
  }

  if (config.enableJobicy) {
    sources.push(new JobicySource(options));
  }

  if (config.enableHeadHunter) {
    sources.push(new HeadHunterSource(options));
  }

  if (config.enableSuperJob) {
    if (config.superJobApiKey) {
      sources.push(new SuperJobSource(options, config.superJobApiKey));
    } else {
      logger.warn('SuperJob enabled but SUPERJOB_API_KEY is not set, skipping');
    }
  }

  if (config.enableAdzuna) {
    const { appId, appKey, countries } = config.adzuna;
    if (appId && appKey && countries.length > 0) {
      sources.push(new AdzunaSource(options, { appId, appKey, countries }));
    } else {
      logger.warn('Adzuna enabled but ADZUNA_APP_ID / ADZUNA_APP_KEY are not set, skipping');
    }
  }

  if (config.enableWWR) {
    sources.push(new WeWorkRemotelySource(options));
  }

  return sources;
}
