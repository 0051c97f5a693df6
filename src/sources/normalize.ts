import type { JobRecord } from '../types/job';
import { MalformedResponseError } from '../utils/errors';
import { generateJobIdentity, type IdentityStrategy } from '../utils/hash';
import { collapseWhitespace, normalizeTags, stripHtml } from '../utils/text';

/**
 * Provider fields an adapter extracts before the common normalization step
 */
export interface JobRecordInput {
  nativeId?: string;
  title: string;
  company?: string | null;
  location?: string | null;
  salary?: string | null;
  tags?: readonly unknown[];
  url?: string | null;
  description?: string | null;
  postedAt?: string | number | null;
  employmentType?: string | null;
}

/**
 * Accepts ISO strings, RFC 2822 strings and unix timestamps (seconds or milliseconds)
 */
export function parsePostedAt(value: string | number | null | undefined): Date | undefined {
  if (value === null || value === undefined || value === '') return undefined;

  let date: Date;
  if (typeof value === 'number' || /^\d+$/.test(value)) {
    const numeric = Number(value);
    date = new Date(numeric < 1e12 ? numeric * 1000 : numeric);
  } else {
    date = new Date(value);
  }

  return isNaN(date.getTime()) ? undefined : date;
}

function cleanOptional(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const cleaned = collapseWhitespace(value);
  return cleaned ? cleaned : undefined;
}

/**
 * Builds an immutable JobRecord; throws MalformedResponseError when the
 * listing lacks a title or a link
 */
export function createJobRecord(
  input: JobRecordInput,
  sourceName: string,
  identityStrategy: IdentityStrategy
): JobRecord {
  const title = stripHtml(input.title);
  const url = input.url?.trim();

  if (!title) {
    throw new MalformedResponseError(`Listing from ${sourceName} has no title`, { nativeId: input.nativeId });
  }
  if (!url) {
    throw new MalformedResponseError(`Listing from ${sourceName} has no url`, { nativeId: input.nativeId, title });
  }

  const company = cleanOptional(input.company) ?? 'Unknown Company';
  const description = input.description ? stripHtml(input.description) : '';
  const nativeId = cleanOptional(input.nativeId);

  return Object.freeze({
    identity: generateJobIdentity({ title, company, sourceName, nativeId }, identityStrategy),
    nativeId,
    title,
    company,
    location: cleanOptional(input.location) ?? 'Remote',
    salary: cleanOptional(input.salary),
    skills: Object.freeze(normalizeTags(input.tags)),
    url,
    sourceName,
    rawText: description ? `${title} ${description}` : title,
    description,
    postedAt: parsePostedAt(input.postedAt),
    employmentType: cleanOptional(input.employmentType),
  });
}
