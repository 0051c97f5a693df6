/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { JOB_LEVELS, type JobLevel } from '../types/job';
import type { IdentityStrategy } from '../utils/hash';
import { DEFAULT_SIGNALS_FILE } from './signals';

type Env = Record<string, string | undefined>;

export interface Config {
  // Telegram
  telegram: {
    botToken: string;
    channelId: string;
  };

  // Database
  databaseUrl: string;

  // Scheduling
  cycleIntervalSeconds: number;
  interSourceDelayMs: number;
  sourceJitterMs: number;
  betweenPostsDelayMs: number;

  // HTTP
  requestTimeoutMs: number;
  rateLimitMaxAttempts: number;

  // Pipeline
  maxPostsPerCycle: number;
  maxJobsPerSource: number;
  dedupRetentionDays: number;
  identityStrategy: IdentityStrategy;
  signalsFile: string;

  // Job Filtering
  includeUnknownLevel: boolean;
  publishLevels: JobLevel[];
  jobExcludedKeywords: string[];
  jobLocations: string[];
  remoteOnly: boolean;

  // Platform Toggles
  enableRemoteOK: boolean;
  enableRemotive: boolean;
  enableJobicy: boolean;
  enableHeadHunter: boolean;
  enableSuperJob: boolean;
  enableAdzuna: boolean;
  enableWWR: boolean;

  // Credentials
  superJobApiKey?: string;
  adzuna: {
    appId?: string;
    appKey?: string;
    countries: string[];
  };
}

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

function parseLevels(value: string | undefined, defaultValue: JobLevel[]): JobLevel[] {
  if (!value?.trim()) return defaultValue;

  const levels: JobLevel[] = [];
  for (const item of parseStringArray(value)) {
    const match = JOB_LEVELS.find(level => level.toLowerCase() === item.toLowerCase());
    if (!match) {
      throw new Error(`Invalid PUBLISH_LEVELS entry: ${item} (expected one of ${JOB_LEVELS.join(', ')})`);
    }
    if (!levels.includes(match)) levels.push(match);
  }
  return levels;
}

function parseIdentityStrategy(value: string | undefined): IdentityStrategy {
  if (!value) return 'content';
  const normalized = value.trim().toLowerCase();
  if (normalized === 'content' || normalized === 'source') return normalized;
  throw new Error(`Invalid IDENTITY_STRATEGY: ${value} (expected content or source)`);
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireEnv(env: Env, name: string): string {
  const value = optional(env[name]);
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const botToken = requireEnv(env, 'TELEGRAM_BOT_TOKEN');
  const channelId = requireEnv(env, 'CHANNEL_ID');
  const databaseUrl = requireEnv(env, 'DATABASE_URL');

  return {
    telegram: {
      botToken,
      channelId,
    },
    databaseUrl,
    cycleIntervalSeconds: parseNumber(env.CHECK_INTERVAL, 1800),
    interSourceDelayMs: parseNumber(env.INTER_SOURCE_DELAY_MS, 5000),
    sourceJitterMs: parseNumber(env.SOURCE_JITTER_MS, 2000),
    betweenPostsDelayMs: parseNumber(env.BETWEEN_POSTS_DELAY_MS, 3000),
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 15000),
    rateLimitMaxAttempts: Math.max(1, parseNumber(env.RATE_LIMIT_MAX_ATTEMPTS, 3)),
    maxPostsPerCycle: parseNumber(env.MAX_POSTS_PER_CYCLE, 15),
    maxJobsPerSource: parseNumber(env.MAX_JOBS_PER_SOURCE, 50),
    dedupRetentionDays: parseNumber(env.DEDUP_RETENTION_DAYS, 7),
    identityStrategy: parseIdentityStrategy(env.IDENTITY_STRATEGY),
    signalsFile: optional(env.SIGNALS_FILE) ?? DEFAULT_SIGNALS_FILE,
    includeUnknownLevel: parseBoolean(env.INCLUDE_UNKNOWN_LEVEL, true),
    publishLevels: parseLevels(env.PUBLISH_LEVELS, ['Junior', 'Middle']),
    jobExcludedKeywords: parseStringArray(env.JOB_EXCLUDED_KEYWORDS),
    jobLocations: parseStringArray(env.JOB_LOCATIONS),
    remoteOnly: parseBoolean(env.REMOTE_ONLY, true),
    enableRemoteOK: parseBoolean(env.ENABLE_REMOTEOK, true),
    enableRemotive: parseBoolean(env.ENABLE_REMOTIVE, true),
    enableJobicy: parseBoolean(env.ENABLE_JOBICY, true),
    enableHeadHunter: parseBoolean(env.ENABLE_HEADHUNTER, true),
    enableSuperJob: parseBoolean(env.ENABLE_SUPERJOB, true),
    enableAdzuna: parseBoolean(env.ENABLE_ADZUNA, true),
    enableWWR: parseBoolean(env.ENABLE_WWR, true),
    superJobApiKey: optional(env.SUPERJOB_API_KEY),
    adzuna: {
      appId: optional(env.ADZUNA_APP_ID),
      appKey: optional(env.ADZUNA_APP_KEY),
      countries: parseStringArray(env.ADZUNA_COUNTRIES, ['us', 'gb']).map(c => c.toLowerCase()),
    },
  };
}
