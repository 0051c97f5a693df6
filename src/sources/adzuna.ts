import { z } from 'zod';
import { formatSalaryRange } from '../utils/text';
import { ApiJobSource, type JobSourceOptions, type SourceRequest } from './base';
import type { JobRecordInput } from './normalize';

const displayNameSchema = z.object({ display_name: z.string().nullish() }).nullish();

const adzunaItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().min(1),
  description: z.string().nullish(),
  redirect_url: z.string(),
  created: z.string().nullish(),
  company: displayNameSchema,
  location: displayNameSchema,
  salary_min: z.number().nullish(),
  salary_max: z.number().nullish(),
  contract_type: z.string().nullish(),
  contract_time: z.string().nullish(),
});

type AdzunaItem = z.infer<typeof adzunaItemSchema>;

const envelopeSchema = z.object({ results: z.array(z.unknown()) });

const COUNTRY_CURRENCY: Record<string, string> = {
  us: 'USD',
  gb: 'GBP',
  ca: 'CAD',
  au: 'AUD',
  de: 'EUR',
  fr: 'EUR',
  nl: 'EUR',
  pl: 'PLN',
};

export interface AdzunaCredentials {
  appId: string;
  appKey: string;
  countries: string[];
}

/**
 * Adzuna search API adapter, one request per configured country
 * API Documentation: https://developer.adzuna.com/
 */
export class AdzunaSource extends ApiJobSource<AdzunaItem> {
  readonly name = 'adzuna';
  protected readonly itemSchema = adzunaItemSchema;

  constructor(options: JobSourceOptions, private readonly credentials: AdzunaCredentials) {
    super(options);
  }

  protected buildRequests(): SourceRequest[] {
    return this.credentials.countries.map(country => ({
      url: `https://api.adzuna.com/v1/api/jobs/${encodeURIComponent(country)}/search/1`,
      label: country,
      query: {
        app_id: this.credentials.appId,
        app_key: this.credentials.appKey,
        results_per_page: 30,
        what: 'developer programmer engineer',
        where: 'remote',
        sort_by: 'date',
      },
    }));
  }

  protected extractItems(payload: unknown): unknown[] {
    return this.parseEnvelope(envelopeSchema, payload).results;
  }

  protected toJobInput(item: AdzunaItem, request: SourceRequest): JobRecordInput {
    // Salaries are in the currency of the country searched
    const currency = request.label ? COUNTRY_CURRENCY[request.label] : undefined;
    const employmentType = [item.contract_time, item.contract_type]
      .filter((part): part is string => Boolean(part))
      .map(part => part.replace(/_/g, ' '))
      .join(', ');

    return {
      nativeId: item.id,
      title: item.title,
      company: item.company?.display_name,
      location: item.location?.display_name,
      salary: formatSalaryRange(item.salary_min, item.salary_max, currency),
      url: item.redirect_url,
      description: item.description,
      postedAt: item.created,
      employmentType,
    };
  }
}
