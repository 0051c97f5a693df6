import { z } from 'zod';
import { ApiJobSource, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const remotiveItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().min(1),
  company_name: z.string().nullish(),
  url: z.string(),
  description: z.string().nullish(),
  tags: z.array(z.unknown()).nullish(),
  job_type: z.string().nullish(),
  publication_date: z.string().nullish(),
  candidate_required_location: z.string().nullish(),
  salary: z.string().nullish(),
});

type RemotiveItem = z.infer<typeof remotiveItemSchema>;

const envelopeSchema = z.object({ jobs: z.array(z.unknown()) });

/**
 * Remotive API adapter
 * API Documentation: https://remotive.com/api/remote-jobs
 */
export class RemotiveSource extends ApiJobSource<RemotiveItem> {
  readonly name = 'remotive';
  protected readonly itemSchema = remotiveItemSchema;
  private readonly apiUrl = 'https://remotive.com/api/remote-jobs';

  protected buildRequests(): SourceRequest[] {
    return [{ url: this.apiUrl }];
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(envelopeSchema, payload).jobs;
  }

  protected toJobInput(job: RemotiveItem): JobRecordInput {
    return {
      nativeId: job.id,
      title: job.title,
      company: job.company_name,
      location: job.candidate_required_location,
      salary: job.salary,
      tags: job.tags ?? undefined,
      url: job.url,
      description: job.description,
      postedAt: job.publication_date,
      employmentType: job.job_type?.replace(/_/g, ' '),
    };
  }
}
