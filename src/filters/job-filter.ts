import type { Config } from '../config';
import type { ClassifiedJob, JobLevel } from '../types/job';
import { logger } from '../utils/logger';
import { containsAnyKeyword } from '../utils/text';

export interface JobFilterOptions {
  includeUnknownLevel: boolean;
  /** Allowed levels; empty allows every level */
  levels: JobLevel[];
  excludedKeywords: string[];
  locations: string[];
  remoteOnly: boolean;
  remoteKeywords: string[];
}

export function jobFilterOptionsFromConfig(config: Config, remoteKeywords: string[]): JobFilterOptions {
  return {
    includeUnknownLevel: config.includeUnknownLevel,
    levels: config.publishLevels,
    excludedKeywords: config.jobExcludedKeywords,
    locations: config.jobLocations,
    remoteOnly: config.remoteOnly,
    remoteKeywords,
  };
}

/**
 * Filters classified jobs based on configuration
 * Runs after relevance gating, before deduplication
 */
export class JobFilter {
  constructor(private options: JobFilterOptions) {}

  /**
   * Checks if a classified job matches the configured filters
   */
  matches({ job, classification }: ClassifiedJob): boolean {
    const { level } = classification;

    if (level === 'Unknown' && !this.options.includeUnknownLevel) {
      logger.debug(`Job filtered out: unknown level`, { job: job.title });
      return false;
    }

    if (this.options.levels.length > 0 && level !== 'Unknown' && !this.options.levels.includes(level)) {
      logger.debug(`Job filtered out: level not published`, { job: job.title, level });
      return false;
    }

    // Check excluded keywords (none should match)
    if (this.options.excludedKeywords.length > 0) {
      const jobText = `${job.title} ${job.company}`;
      if (containsAnyKeyword(jobText, this.options.excludedKeywords)) {
        logger.debug(`Job filtered out: contains excluded keyword`, { job: job.title });
        return false;
      }
    }

    // Check location filter
    if (this.options.locations.length > 0) {
      const jobLocation = job.location.toLowerCase();
      const matchesLocation = this.options.locations.some(location =>
        jobLocation.includes(location.toLowerCase())
      );
      if (!matchesLocation) {
        logger.debug(`Job filtered out: location mismatch`, { job: job.title, location: job.location });
        return false;
      }
    }

    if (this.options.remoteOnly) {
      const text = `${job.location} ${job.rawText}`;
      if (!containsAnyKeyword(text, this.options.remoteKeywords)) {
        logger.debug(`Job filtered out: not remote`, { job: job.title });
        return false;
      }
    }

    return true;
  }

  /**
   * Filters an array of classified jobs
   */
  filter(jobs: ClassifiedJob[]): ClassifiedJob[] {
    return jobs.filter(job => this.matches(job));
  }
}
