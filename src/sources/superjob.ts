import { z } from 'zod';
import { formatSalaryRange } from '../utils/text';
import { ApiJobSource, type JobSourceOptions, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const titledSchema = z.object({ title: z.string().nullish() }).nullish();

const superJobItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  profession: z.string().min(1),
  firm_name: z.string().nullish(),
  candidat: z.string().nullish(),
  link: z.string(),
  payment_from: z.number().nullish(),
  payment_to: z.number().nullish(),
  currency: z.string().nullish(),
  date_published: z.number().nullish(),
  town: titledSchema,
  type_of_work: titledSchema,
  place_of_work: titledSchema,
});

type SuperJobItem = z.infer<typeof superJobItemSchema>;

const envelopeSchema = z.object({ objects: z.array(z.unknown()) });

/**
 * SuperJob API adapter
 * Requires an application secret key (X-Api-App-Id)
 * API Documentation: https://api.superjob.ru/
 */
export class SuperJobSource extends ApiJobSource<SuperJobItem> {
  readonly name = 'superjob';
  protected readonly itemSchema = superJobItemSchema;
  private readonly apiUrl = 'https://api.superjob.ru/2.0/vacancies/';

  constructor(options: JobSourceOptions, private readonly apiKey: string) {
    super(options);
  }

  protected buildRequests(): SourceRequest[] {
    return [
      {
        url: this.apiUrl,
        headers: { 'X-Api-App-Id': this.apiKey },
        query: {
          keyword: 'программист разработчик',
          count: 20,
        },
      },
    ];
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(envelopeSchema, payload).objects;
  }

  protected toJobInput(item: SuperJobItem): JobRecordInput {
    const location = [item.town?.title, item.place_of_work?.title]
      .filter((part): part is string => Boolean(part))
      .join(', ');

    return {
      nativeId: item.id,
      title: item.profession,
      company: item.firm_name,
      location,
      salary: formatSalaryRange(item.payment_from, item.payment_to, (item.currency ?? 'rub').toUpperCase()),
      url: item.link,
      description: item.candidat,
      postedAt: item.date_published,
      employmentType: item.type_of_work?.title,
    };
  }
}
