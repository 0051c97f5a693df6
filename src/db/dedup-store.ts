import type { JobLevel } from '../types/job';
import { PersistenceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { SCHEMA_SQL } from './schema';

export interface DedupMetadata {
  title?: string;
  company?: string;
  level?: JobLevel;
  sourceName?: string;
}

/**
 * Persistent record of published vacancy identities
 */
export interface DedupStore {
  /**
   * Creates the schema and checks connectivity; throws PersistenceError
   * when the store cannot be opened at all
   */
  init(): Promise<void>;

  hasSeen(identity: string): Promise<boolean>;

  /**
   * Idempotent: an identity already present keeps its original first_seen_at.
   * Resolves to true when a new entry was written.
   */
  markSeen(identity: string, seenAt: Date, meta?: DedupMetadata): Promise<boolean>;

  /**
   * Deletes entries first seen before now - windowMs; resolves to the number removed
   */
  expireOlderThan(windowMs: number, now?: Date): Promise<number>;
}

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * The slice of pg's Pool this store needs
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

function truncate(value: string | undefined, maxLength: number): string | null {
  if (!value) return null;
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

/**
 * Dedup store backed by the posted_jobs table.
 * Uniqueness is enforced by the primary key, so markSeen is safe to repeat.
 */
export class PostgresDedupStore implements DedupStore {
  constructor(private readonly db: Queryable) {}

  async init(): Promise<void> {
    try {
      await this.db.query(SCHEMA_SQL);
      await this.db.query('SELECT 1');
    } catch (error) {
      throw new PersistenceError(`Cannot open dedup store: ${errorMessage(error)}`, {
        operation: 'init',
      });
    }
  }

  async hasSeen(identity: string): Promise<boolean> {
    try {
      const result = await this.db.query(
        'SELECT 1 FROM posted_jobs WHERE identity = $1 LIMIT 1',
        [identity]
      );
      return result.rows.length > 0;
    } catch (error) {
      throw new PersistenceError(`Dedup lookup failed: ${errorMessage(error)}`, {
        operation: 'hasSeen',
        identity,
      });
    }
  }

  async markSeen(identity: string, seenAt: Date, meta: DedupMetadata = {}): Promise<boolean> {
    try {
      const result = await this.db.query(
        `INSERT INTO posted_jobs (identity, first_seen_at, title, company, level, source_name)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (identity) DO NOTHING`,
        [
          identity,
          seenAt,
          truncate(meta.title, 500),
          truncate(meta.company, 255),
          meta.level ?? null,
          truncate(meta.sourceName, 50),
        ]
      );
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw new PersistenceError(`Dedup write failed: ${errorMessage(error)}`, {
        operation: 'markSeen',
        identity,
      });
    }
  }

  async expireOlderThan(windowMs: number, now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - windowMs);

    try {
      const result = await this.db.query('DELETE FROM posted_jobs WHERE first_seen_at < $1', [cutoff]);
      const removed = result.rowCount ?? 0;
      if (removed > 0) {
        logger.info(`Expired ${removed} dedup entries`, { cutoff: cutoff.toISOString() });
      }
      return removed;
    } catch (error) {
      throw new PersistenceError(`Dedup expiry failed: ${errorMessage(error)}`, {
        operation: 'expireOlderThan',
      });
    }
  }
}
