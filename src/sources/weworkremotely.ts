import Parser from 'rss-parser';
import { z } from 'zod';
import { MalformedResponseError, errorMessage } from '../utils/errors';
import { ApiJobSource, type JobSourceOptions, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const rssItemSchema = z.object({
  title: z.string().min(1),
  link: z.string().min(1),
  guid: z.string().nullish(),
  pubDate: z.string().nullish(),
  content: z.string().nullish(),
  contentSnippet: z.string().nullish(),
  categories: z.array(z.unknown()).nullish(),
});

type RssItem = z.infer<typeof rssItemSchema>;

const feedSchema = z.object({ items: z.array(z.unknown()).default([]) });

/**
 * Splits "Company Name: Job Title" (colon format), falling back to
 * "Job Title - Company Name" (dash format)
 */
export function splitFeedTitle(rawTitle: string): { title: string; company?: string } {
  const colonMatch = rawTitle.match(/^(.+?):\s*(.+)$/);
  if (colonMatch) {
    return { company: colonMatch[1].trim(), title: colonMatch[2].trim() };
  }

  const dashMatch = rawTitle.match(/^(.+?)\s+-\s+(.+)$/);
  if (dashMatch) {
    return { title: dashMatch[1].trim(), company: dashMatch[2].trim() };
  }

  return { title: rawTitle.trim() };
}

/**
 * WeWorkRemotely RSS adapter
 * RSS Feed: https://weworkremotely.com/categories/remote-programming-jobs.rss
 */
export class WeWorkRemotelySource extends ApiJobSource<RssItem> {
  readonly name = 'weworkremotely';
  protected readonly itemSchema = rssItemSchema;
  private readonly rssUrl = 'https://weworkremotely.com/categories/remote-programming-jobs.rss';
  private readonly parser: Parser;

  constructor(options: JobSourceOptions) {
    super(options);
    this.parser = new Parser();
  }

  protected buildRequests(): SourceRequest[] {
    return [{ url: this.rssUrl }];
  }

  protected async fetchPayload(request: SourceRequest): Promise<unknown> {
    const xml = await this.options.http.getText(request.url, request);
    try {
      return await this.parser.parseString(xml);
    } catch (error) {
      throw new MalformedResponseError(`Feed from ${this.name} is not valid RSS`, {
        source: this.name,
        cause: errorMessage(error),
      });
    }
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(feedSchema, payload).items;
  }

  protected toJobInput(item: RssItem): JobRecordInput {
    const { title, company } = splitFeedTitle(item.title);

    return {
      nativeId: item.guid ?? item.link,
      title,
      company,
      location: 'Remote',
      tags: item.categories ?? undefined,
      url: item.link,
      description: item.content ?? item.contentSnippet,
      postedAt: item.pubDate,
    };
  }
}
