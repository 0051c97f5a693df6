import { z } from 'zod';
import { formatSalaryRange } from '../utils/text';
import { ApiJobSource, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const jobicyItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  url: z.string(),
  jobTitle: z.string().min(1),
  companyName: z.string().nullish(),
  jobIndustry: z.array(z.unknown()).nullish(),
  jobType: z.union([z.string(), z.array(z.string())]).nullish(),
  jobGeo: z.string().nullish(),
  jobLevel: z.string().nullish(),
  jobExcerpt: z.string().nullish(),
  jobDescription: z.string().nullish(),
  pubDate: z.string().nullish(),
  annualSalaryMin: z.union([z.number(), z.string()]).nullish(),
  annualSalaryMax: z.union([z.number(), z.string()]).nullish(),
  salaryCurrency: z.string().nullish(),
});

type JobicyItem = z.infer<typeof jobicyItemSchema>;

const envelopeSchema = z.object({ jobs: z.array(z.unknown()) });

function toAmount(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const amount = typeof value === 'number' ? value : Number(value);
  return isNaN(amount) ? undefined : amount;
}

/**
 * Jobicy API adapter
 * API Documentation: https://jobicy.com/jobs-rss-feed
 */
export class JobicySource extends ApiJobSource<JobicyItem> {
  readonly name = 'jobicy';
  protected readonly itemSchema = jobicyItemSchema;
  private readonly apiUrl = 'https://jobicy.com/api/v2/remote-jobs';

  protected buildRequests(): SourceRequest[] {
    return [{ url: this.apiUrl, query: { count: 50 } }];
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(envelopeSchema, payload).jobs;
  }

  protected toJobInput(job: JobicyItem): JobRecordInput {
    const employmentType = Array.isArray(job.jobType) ? job.jobType.join(', ') : job.jobType;

    return {
      nativeId: job.id,
      title: job.jobTitle,
      company: job.companyName,
      location: job.jobGeo,
      salary: formatSalaryRange(
        toAmount(job.annualSalaryMin),
        toAmount(job.annualSalaryMax),
        job.salaryCurrency
      ),
      tags: job.jobIndustry ?? undefined,
      url: job.url,
      description: job.jobExcerpt || job.jobDescription,
      postedAt: job.pubDate,
      employmentType,
    };
  }
}
