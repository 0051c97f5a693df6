import fetch from 'node-fetch';
import {
  MalformedResponseError,
  RateLimitedError,
  SourceUnavailableError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep, type SleepFunction } from '../utils/sleep';

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

export interface HttpResponseLike {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface HttpRequestInit {
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Shape of node-fetch's default export that we rely on
 */
export type FetchFunction = (url: string, init?: HttpRequestInit) => Promise<HttpResponseLike>;

export interface HttpClientOptions {
  fetchFn?: FetchFunction;
  sleep?: SleepFunction;
  random?: () => number;
  now?: () => Date;
  timeoutMs?: number;
  maxAttempts?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  timeoutMs?: number;
}

export function buildUrl(url: string, query?: Record<string, string | number>): string {
  if (!query) return url;
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    parsed.searchParams.set(key, String(value));
  }
  return parsed.toString();
}

/**
 * Origin + path only, so credentials passed as query params never reach the logs
 */
export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return 'invalid-url';
  }
}

/**
 * Retry-After is either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: Date): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now.getTime());
}

/**
 * Thin HTTP layer shared by all source adapters.
 * Maps provider responses onto the source error taxonomy and retries 429s
 * with exponential backoff.
 */
export class HttpClient {
  private readonly fetchFn: FetchFunction;
  private readonly sleep: SleepFunction;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseBackoffMs = options.baseBackoffMs ?? 2000;
    this.maxBackoffMs = options.maxBackoffMs ?? 60000;
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const fullUrl = buildUrl(url, options.query);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(fullUrl, options);
      } catch (error) {
        if (!(error instanceof RateLimitedError) || attempt >= this.maxAttempts) {
          throw error;
        }

        const delay = this.backoffDelay(attempt, error.retryAfterMs);
        logger.warn(`Rate limited by ${describeUrl(fullUrl)}, retrying in ${delay}ms`, {
          attempt,
          maxAttempts: this.maxAttempts,
        });
        await this.sleep(delay);
      }
    }
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.getText(url, options);
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new MalformedResponseError(`Response from ${describeUrl(url)} is not valid JSON`, {
        url: describeUrl(url),
        cause: errorMessage(error),
      });
    }
  }

  backoffDelay(attempt: number, retryAfterMs?: number): number {
    const exponential = this.baseBackoffMs * 2 ** (attempt - 1);
    return Math.min(this.maxBackoffMs, Math.max(retryAfterMs ?? 0, exponential));
  }

  private pickUserAgent(): string {
    const index = Math.min(USER_AGENTS.length - 1, Math.floor(this.random() * USER_AGENTS.length));
    return USER_AGENTS[index];
  }

  private async attempt(url: string, options: RequestOptions): Promise<string> {
    const target = describeUrl(url);
    let response: HttpResponseLike;

    try {
      response = await this.fetchFn(url, {
        headers: {
          'User-Agent': this.pickUserAgent(),
          Accept: 'application/json, application/rss+xml, text/xml;q=0.9, */*;q=0.8',
          ...options.headers,
        },
        timeout: options.timeoutMs ?? this.timeoutMs,
      });
    } catch (error) {
      throw new SourceUnavailableError(`Request to ${target} failed: ${errorMessage(error)}`, {
        url: target,
      });
    }

    if (response.status === 429) {
      throw new RateLimitedError(
        `${target} returned 429`,
        parseRetryAfter(response.headers.get('retry-after'), this.now()),
        { url: target, status: response.status }
      );
    }

    if (!response.ok) {
      throw new SourceUnavailableError(`${target} returned ${response.status}`, {
        url: target,
        status: response.status,
        permanent: response.status === 401 || response.status === 403,
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new SourceUnavailableError(`Reading response from ${target} failed: ${errorMessage(error)}`, {
        url: target,
      });
    }
  }
}
