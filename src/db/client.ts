import { Pool } from 'pg';
import { logger } from '../utils/logger';

type Env = Record<string, string | undefined>;

export type SslConfig = boolean | { rejectUnauthorized: boolean };

/**
 * Production: always SSL (managed databases require it).
 * Development: SSL by default, DATABASE_SSL=false disables it.
 * rejectUnauthorized is off so self-signed managed-database certificates work.
 */
export function resolveSslConfig(env: Env = process.env): SslConfig {
  const isProduction = env.NODE_ENV === 'production';

  if (!isProduction && env.DATABASE_SSL === 'false') {
    return false;
  }
  return { rejectUnauthorized: false };
}

/**
 * Drops SSL query params so the explicit ssl option takes precedence
 */
export function cleanConnectionString(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings are passed through; ssl option still applies
    return databaseUrl;
  }
}

let pool: Pool | null = null;

export function getPool(databaseUrl: string): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: cleanConnectionString(databaseUrl),
      ssl: resolveSslConfig(),
      // The bot is a single sequential worker; a small pool is plenty
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}
