import { z } from 'zod';
import { formatSalaryRange } from '../utils/text';
import { ApiJobSource, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const remoteOkItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  position: z.string().min(1),
  company: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  tags: z.array(z.unknown()).nullish(),
  url: z.string().nullish(),
  apply_url: z.string().nullish(),
  date: z.string().nullish(),
  epoch: z.number().nullish(),
  salary_min: z.number().nullish(),
  salary_max: z.number().nullish(),
});

type RemoteOkItem = z.infer<typeof remoteOkItemSchema>;

// The first array element is a legal notice, not a listing
const legalNoticeSchema = z.object({ legal: z.string() });

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 */
export class RemoteOKSource extends ApiJobSource<RemoteOkItem> {
  readonly name = 'remoteok';
  protected readonly itemSchema = remoteOkItemSchema;
  private readonly apiUrl = 'https://remoteok.com/api';

  protected buildRequests(): SourceRequest[] {
    return [{ url: this.apiUrl }];
  }

  protected extractItems(payload: unknown): unknown[] {
    const items = this.parseEnvelope(z.array(z.unknown()), payload);
    return items.filter(item => !legalNoticeSchema.safeParse(item).success);
  }

  protected toJobInput(job: RemoteOkItem): JobRecordInput {
    return {
      nativeId: job.id,
      title: job.position,
      company: job.company,
      location: job.location,
      salary: formatSalaryRange(job.salary_min, job.salary_max, 'USD'),
      tags: job.tags ?? undefined,
      url: job.url || job.apply_url || `https://remoteok.com/remote-jobs/${job.id}`,
      description: job.description,
      postedAt: job.date ?? job.epoch,
    };
  }
}
