import type { DedupMetadata, DedupStore } from '../src/db/dedup-store';
import type { HttpResponseLike } from '../src/sources/http';
import type { JobPublisher } from '../src/services/telegram-publisher';
import type { ClassifiedJob, ClassificationResult, JobRecord, SignalSets } from '../src/types/job';
import { generateJobIdentity } from '../src/utils/hash';

export const testSignals: SignalSets = {
  juniorSignals: ['junior', 'jr.', 'entry level', 'intern'],
  middleSignals: ['middle', 'mid-level', '3+ years'],
  seniorSignals: ['senior', 'lead', 'architect', '5+ years'],
  itRoles: ['developer', 'engineer', 'python', 'django', 'qa'],
  remoteKeywords: ['remote', 'anywhere'],
  techStack: ['Python', 'Django', 'PostgreSQL', 'Docker', 'C#', 'Node.js'],
};

export function makeJob(overrides: Partial<JobRecord> & { title: string }): JobRecord {
  const company = overrides.company ?? 'Acme';
  const sourceName = overrides.sourceName ?? 'remoteok';
  return {
    identity: generateJobIdentity({ title: overrides.title, company, sourceName }),
    company,
    location: 'Remote',
    skills: [],
    url: `https://example.com/jobs/${encodeURIComponent(overrides.title)}`,
    sourceName,
    rawText: overrides.title,
    description: '',
    ...overrides,
  };
}

export function classified(
  job: JobRecord,
  classification: Partial<ClassificationResult> = {}
): ClassifiedJob {
  return {
    job,
    classification: { level: 'Unknown', isRelevant: true, techStack: [], ...classification },
  };
}

interface FakeResponseInit {
  status?: number;
  headers?: Record<string, string>;
}

export function fakeResponse(body: unknown, init: FakeResponseInit = {}): HttpResponseLike {
  const status = init.status ?? 200;
  const headers = Object.fromEntries(
    Object.entries(init.headers ?? {}).map(([key, value]) => [key.toLowerCase(), value])
  );
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: { get: name => headers[name.toLowerCase()] ?? null },
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

/**
 * In-process stand-in for the posted_jobs table
 */
export class InMemoryDedupStore implements DedupStore {
  readonly entries = new Map<string, { seenAt: Date; meta: DedupMetadata }>();
  failHasSeen = false;
  failExpire = false;
  /** Number of upcoming markSeen calls that reject */
  markSeenFailures = 0;
  markSeenCalls = 0;

  async init(): Promise<void> {}

  async hasSeen(identity: string): Promise<boolean> {
    if (this.failHasSeen) throw new Error('connection refused');
    return this.entries.has(identity);
  }

  async markSeen(identity: string, seenAt: Date, meta: DedupMetadata = {}): Promise<boolean> {
    this.markSeenCalls++;
    if (this.markSeenFailures > 0) {
      this.markSeenFailures--;
      throw new Error('write timeout');
    }
    if (this.entries.has(identity)) return false;
    this.entries.set(identity, { seenAt, meta });
    return true;
  }

  async expireOlderThan(windowMs: number, now: Date = new Date()): Promise<number> {
    if (this.failExpire) throw new Error('connection refused');
    const cutoff = now.getTime() - windowMs;
    let removed = 0;
    for (const [identity, entry] of this.entries) {
      if (entry.seenAt.getTime() < cutoff) {
        this.entries.delete(identity);
        removed++;
      }
    }
    return removed;
  }
}

export class RecordingPublisher implements JobPublisher {
  readonly messages: string[] = [];
  /** 1-based publish attempts that reject */
  readonly failOn = new Set<number>();
  private attempts = 0;

  constructor(private readonly failure: () => Error = () => new Error('socket hang up')) {}

  async publish(message: string): Promise<void> {
    this.attempts++;
    if (this.failOn.has(this.attempts)) {
      throw this.failure();
    }
    this.messages.push(message);
  }
}
