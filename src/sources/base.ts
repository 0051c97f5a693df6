import { z } from 'zod';
import type { JobRecord } from '../types/job';
import { MalformedResponseError, errorMessage } from '../utils/errors';
import type { IdentityStrategy } from '../utils/hash';
import { logger } from '../utils/logger';
import type { HttpClient, RequestOptions } from './http';
import { createJobRecord, type JobRecordInput } from './normalize';

export interface SourceFetchResult {
  jobs: JobRecord[];
  /** Listings dropped because they were malformed */
  skipped: number;
}

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches the current listings, normalized to JobRecord.
   * Rejects when the source as a whole is unavailable, rate limited
   * past the retry budget, or returned an unusable envelope.
   */
  fetchJobs(): Promise<SourceFetchResult>;
}

export interface JobSourceOptions {
  http: HttpClient;
  identityStrategy: IdentityStrategy;
  maxJobs: number;
}

export interface SourceRequest extends RequestOptions {
  url: string;
  /** Shown in logs when a source issues several requests */
  label?: string;
}

/**
 * Shared fetch, validate, normalize loop for HTTP sources.
 * A listing that fails validation is skipped; the rest of the batch survives.
 */
export abstract class ApiJobSource<TItem> implements JobSource {
  abstract readonly name: string;
  protected abstract readonly itemSchema: z.ZodType<TItem, z.ZodTypeDef, unknown>;

  constructor(protected readonly options: JobSourceOptions) {}

  protected abstract buildRequests(): SourceRequest[];

  /**
   * Pulls the list of raw listings out of a response payload
   */
  protected abstract extractItems(payload: unknown): unknown[];

  protected abstract toJobInput(item: TItem, request: SourceRequest): JobRecordInput;

  protected async fetchPayload(request: SourceRequest): Promise<unknown> {
    return this.options.http.getJson(request.url, request);
  }

  protected parseEnvelope<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new MalformedResponseError(`Unexpected response shape from ${this.name}`, {
        source: this.name,
        path: issue.path.join('.'),
        issue: issue.message,
      });
    }
    return result.data;
  }

  async fetchJobs(): Promise<SourceFetchResult> {
    const requests = this.buildRequests();
    const jobs: JobRecord[] = [];
    let skipped = 0;
    let failures = 0;
    let lastError: unknown;

    for (const request of requests) {
      const label = request.label ? `${this.name}/${request.label}` : this.name;

      try {
        const payload = await this.fetchPayload(request);
        const items = this.extractItems(payload);
        const before = jobs.length;

        for (const item of items) {
          const normalized = this.normalizeItem(item, request);
          if (normalized) {
            jobs.push(normalized);
          } else {
            skipped++;
          }
        }

        logger.info(`Fetched ${jobs.length - before} jobs from ${label}`, {
          items: items.length,
        });
      } catch (error) {
        failures++;
        lastError = error;
        if (requests.length > 1) {
          logger.warn(`Request ${label} failed, continuing with remaining requests`, {
            error: errorMessage(error),
          });
        }
      }
    }

    if (requests.length > 0 && failures === requests.length) {
      throw lastError;
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed listings from ${this.name}`);
    }

    return { jobs: jobs.slice(0, this.options.maxJobs), skipped };
  }

  private normalizeItem(item: unknown, request: SourceRequest): JobRecord | undefined {
    const parsed = this.itemSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      logger.debug(`Malformed listing from ${this.name}`, {
        path: issue.path.join('.'),
        issue: issue.message,
      });
      return undefined;
    }

    try {
      return createJobRecord(this.toJobInput(parsed.data, request), this.name, this.options.identityStrategy);
    } catch (error) {
      logger.debug(`Failed to normalize listing from ${this.name}`, { error: errorMessage(error) });
      return undefined;
    }
  }
}
