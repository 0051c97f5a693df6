import { z } from 'zod';
import { formatSalaryRange } from '../utils/text';
import { ApiJobSource, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const namedSchema = z.object({ name: z.string().nullish() }).nullish();

const headHunterItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().min(1),
  employer: namedSchema,
  area: namedSchema,
  salary: z
    .object({
      from: z.number().nullish(),
      to: z.number().nullish(),
      currency: z.string().nullish(),
    })
    .nullish(),
  snippet: z
    .object({
      requirement: z.string().nullish(),
      responsibility: z.string().nullish(),
    })
    .nullish(),
  schedule: namedSchema,
  employment: namedSchema,
  alternate_url: z.string(),
  published_at: z.string().nullish(),
});

type HeadHunterItem = z.infer<typeof headHunterItemSchema>;

const envelopeSchema = z.object({ items: z.array(z.unknown()) });

/**
 * HeadHunter (hh.ru) vacancies API adapter
 * API Documentation: https://api.hh.ru/openapi/redoc
 */
export class HeadHunterSource extends ApiJobSource<HeadHunterItem> {
  readonly name = 'headhunter';
  protected readonly itemSchema = headHunterItemSchema;
  private readonly apiUrl = 'https://api.hh.ru/vacancies';

  protected buildRequests(): SourceRequest[] {
    return [
      {
        url: this.apiUrl,
        query: {
          text: 'программист разработчик developer',
          per_page: 50,
          page: 0,
        },
      },
    ];
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(envelopeSchema, payload).items;
  }

  protected toJobInput(item: HeadHunterItem): JobRecordInput {
    const description = [
      item.snippet?.requirement,
      item.snippet?.responsibility,
      item.schedule?.name,
    ]
      .filter((part): part is string => Boolean(part))
      .join(' ');

    return {
      nativeId: item.id,
      title: item.name,
      company: item.employer?.name,
      location: item.area?.name,
      salary: item.salary
        ? formatSalaryRange(item.salary.from, item.salary.to, item.salary.currency ?? 'RUB')
        : undefined,
      url: item.alternate_url,
      description,
      postedAt: item.published_at,
      employmentType: item.employment?.name,
    };
  }
}
