import { describe, it, expect } from 'vitest';
import { JobFilter, type JobFilterOptions } from '../src/filters/job-filter';
import { classified, makeJob } from './helpers';

const defaults: JobFilterOptions = {
  includeUnknownLevel: true,
  levels: [],
  excludedKeywords: [],
  locations: [],
  remoteOnly: false,
  remoteKeywords: ['remote', 'anywhere'],
};

function filterWith(options: Partial<JobFilterOptions>): JobFilter {
  return new JobFilter({ ...defaults, ...options });
}

describe('JobFilter', () => {
  const junior = classified(makeJob({ title: 'Junior Developer' }), { level: 'Junior' });
  const senior = classified(makeJob({ title: 'Senior Developer' }), { level: 'Senior' });
  const unknown = classified(makeJob({ title: 'Developer' }), { level: 'Unknown' });

  it('passes everything with default options', () => {
    expect(filterWith({}).filter([junior, senior, unknown])).toEqual([junior, senior, unknown]);
  });

  it('restricts levels without touching unknown ones', () => {
    expect(filterWith({ levels: ['Junior', 'Middle'] }).filter([junior, senior, unknown])).toEqual([junior, unknown]);
  });

  it('drops unknown levels when configured', () => {
    expect(filterWith({ includeUnknownLevel: false }).filter([junior, unknown])).toEqual([junior]);
  });

  it('excludes keywords found in title or company', () => {
    const crypto = classified(makeJob({ title: 'Backend Developer', company: 'Crypto Casino Ltd' }));
    const filter = filterWith({ excludedKeywords: ['casino'] });

    expect(filter.matches(crypto)).toBe(false);
    expect(filter.matches(junior)).toBe(true);
  });

  it('keeps listings whose location contains a configured one', () => {
    const berlin = classified(makeJob({ title: 'Go Developer', location: 'Berlin, Germany' }));
    const filter = filterWith({ locations: ['germany'] });

    expect(filter.matches(berlin)).toBe(true);
    expect(filter.matches(junior)).toBe(false);
  });

  it('requires a remote keyword in remote-only mode', () => {
    const office = classified(makeJob({ title: 'Go Developer', location: 'Berlin', rawText: 'Go Developer on site' }));
    const anywhere = classified(
      makeJob({ title: 'Go Developer', location: 'Berlin', rawText: 'Go Developer, work from anywhere' })
    );
    const filter = filterWith({ remoteOnly: true });

    expect(filter.matches(office)).toBe(false);
    expect(filter.matches(anywhere)).toBe(true);
    expect(filter.matches(junior)).toBe(true);
  });
});
