import { describe, it, expect, vi } from 'vitest';
import { HttpClient, buildUrl, describeUrl, parseRetryAfter, type FetchFunction } from '../src/sources/http';
import { MalformedResponseError, RateLimitedError, SourceUnavailableError } from '../src/utils/errors';
import { fakeResponse } from './helpers';

function createClient(fetchFn: FetchFunction) {
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new HttpClient({
    fetchFn,
    sleep,
    random: () => 0,
    now: () => new Date('2024-05-01T12:00:00Z'),
    maxAttempts: 3,
    baseBackoffMs: 1000,
    maxBackoffMs: 10000,
  });
  return { client, sleep };
}

describe('HttpClient', () => {
  it('returns parsed JSON and sends a browser user agent', async () => {
    const fetchFn = vi.fn<Parameters<FetchFunction>, ReturnType<FetchFunction>>(async () =>
      fakeResponse({ jobs: [] })
    );
    const { client } = createClient(fetchFn);

    await expect(client.getJson('https://api.example.com/jobs', { query: { count: 50 } })).resolves.toEqual({
      jobs: [],
    });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.example.com/jobs?count=50');
    expect(init?.headers?.['User-Agent']).toContain('Mozilla/5.0 (Windows NT 10.0');
    expect(init?.timeout).toBe(15000);
  });

  it('retries 429 with exponential backoff and then succeeds', async () => {
    const fetchFn = vi
      .fn<Parameters<FetchFunction>, ReturnType<FetchFunction>>()
      .mockResolvedValueOnce(fakeResponse('', { status: 429 }))
      .mockResolvedValueOnce(fakeResponse('', { status: 429 }))
      .mockResolvedValueOnce(fakeResponse('ok'));
    const { client, sleep } = createClient(fetchFn);

    await expect(client.getText('https://api.example.com/jobs')).resolves.toBe('ok');
    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000]);
  });

  it('honours Retry-After when it asks for longer', async () => {
    const fetchFn = vi
      .fn<Parameters<FetchFunction>, ReturnType<FetchFunction>>()
      .mockResolvedValueOnce(fakeResponse('', { status: 429, headers: { 'Retry-After': '5' } }))
      .mockResolvedValueOnce(fakeResponse('ok'));
    const { client, sleep } = createClient(fetchFn);

    await client.getText('https://api.example.com/jobs');
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('gives up with RateLimitedError after the last attempt', async () => {
    const fetchFn = vi.fn<Parameters<FetchFunction>, ReturnType<FetchFunction>>(async () =>
      fakeResponse('', { status: 429 })
    );
    const { client, sleep } = createClient(fetchFn);

    await expect(client.getText('https://api.example.com/jobs')).rejects.toBeInstanceOf(RateLimitedError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('maps 5xx to SourceUnavailableError without retrying', async () => {
    const fetchFn = vi.fn<Parameters<FetchFunction>, ReturnType<FetchFunction>>(async () =>
      fakeResponse('', { status: 503 })
    );
    const { client } = createClient(fetchFn);

    const error = await client.getText('https://api.example.com/jobs').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('flags 403 as permanent and keeps credentials out of the error', async () => {
    const { client } = createClient(async () => fakeResponse('', { status: 403 }));

    const error = await client
      .getText('https://api.example.com/jobs', { query: { app_key: 'test-secret' } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    if (!(error instanceof SourceUnavailableError)) return;
    expect(error.message).toBe('https://api.example.com/jobs returned 403');
    expect(error.context).toEqual({ url: 'https://api.example.com/jobs', status: 403, permanent: true });
  });

  it('maps network failures to SourceUnavailableError', async () => {
    const { client } = createClient(async () => {
      throw new Error('ECONNRESET');
    });

    await expect(client.getText('https://api.example.com/jobs')).rejects.toThrow(
      'Request to https://api.example.com/jobs failed: ECONNRESET'
    );
  });

  it('maps invalid JSON to MalformedResponseError', async () => {
    const { client } = createClient(async () => fakeResponse('<html>maintenance</html>'));

    await expect(client.getJson('https://api.example.com/jobs')).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('caps the backoff delay', () => {
    const { client } = createClient(async () => fakeResponse('ok'));
    expect(client.backoffDelay(1)).toBe(1000);
    expect(client.backoffDelay(3)).toBe(4000);
    expect(client.backoffDelay(10)).toBe(10000);
    expect(client.backoffDelay(1, 60000)).toBe(10000);
  });
});

describe('http helpers', () => {
  it('builds query strings', () => {
    expect(buildUrl('https://api.hh.ru/vacancies', { text: 'developer', page: 0 })).toBe(
      'https://api.hh.ru/vacancies?text=developer&page=0'
    );
  });

  it('describes a url without its query', () => {
    expect(describeUrl('https://api.example.com/v1/jobs?app_key=test-secret')).toBe('https://api.example.com/v1/jobs');
  });

  it('parses Retry-After seconds and dates', () => {
    const now = new Date('2024-05-01T12:00:00Z');
    expect(parseRetryAfter('30', now)).toBe(30000);
    expect(parseRetryAfter('Wed, 01 May 2024 12:00:10 GMT', now)).toBe(10000);
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(null, now)).toBeUndefined();
  });
});
