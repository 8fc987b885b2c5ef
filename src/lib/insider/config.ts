/**
 * Resolver configuration from environment variables.
 *
 * Invalid values never throw: they fall back to the default with a warning.
 */

import { createLogger } from '@/lib/logger';
import { DEFAULT_RATE_CAPACITY, DEFAULT_RATE_PER_SECOND } from './rate-budget';
import { MATCH_THRESHOLD } from './scoring';

const log = createLogger('InsiderConfig');

export const DEFAULT_USER_AGENT = 'insider-identity/0.1 admin@example.com';
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
export const DEFAULT_CACHE_TTL_SECONDS = 4 * 60 * 60;
export const DEFAULT_NEGATIVE_CACHE_TTL_SECONDS = 15 * 60;
export const DEFAULT_RECENCY_WINDOW_DAYS = 365;
export const DEFAULT_SCAN_CONCURRENCY = 8;
export const DEFAULT_DEADLINE_MS = 60_000;
export const DEFAULT_GRACE_MS = 2_000;
export const DEFAULT_SEARCH_YEARS_BACK = 10;
export const DEFAULT_MAX_SEARCH_QUERIES = 3;
export const DEFAULT_MIN_INDEXED_MATCHES = 1;
export const DEFAULT_FILINGS_PER_ENTITY = 10;
export const DEFAULT_MIN_FILINGS = 1;

export interface ResolverConfig {
  userAgent: string;
  requestTimeoutMs: number;
  rateLimitPerSecond: number;
  rateCapacity: number;
  matchThreshold: number;
  cacheTtlMs: number;
  negativeCacheTtlMs: number;
  recencyWindowDays: number;
  scanConcurrency: number;
  /** null scans the whole universe */
  entityLimit: number | null;
  deadlineMs: number;
  graceMs: number;
  searchYearsBack: number;
  maxSearchQueries: number;
  minIndexedMatches: number;
  filingsPerEntity: number;
  minFilings: number;
}

type Env = Record<string, string | undefined>;

function parseIntSafe(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isFinite(parsed) && parsed >= min) return parsed;
  log.warn({ envVar: name, raw, default: fallback }, `Invalid ${name}, using default`);
  return fallback;
}

function parseFloatSafe(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  if (Number.isFinite(parsed) && parsed >= min && parsed <= max) return parsed;
  log.warn({ envVar: name, raw, default: fallback }, `Invalid ${name}, using default`);
  return fallback;
}

function parseLimit(env: Env, name: string): number | null {
  const raw = env[name];
  if (!raw || raw.toLowerCase() === 'none') return null;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  log.warn({ envVar: name, raw }, `Invalid ${name}, scanning all entities`);
  return null;
}

export function getResolverConfig(env: Env = process.env): ResolverConfig {
  return {
    userAgent: env.EDGAR_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    requestTimeoutMs: parseIntSafe(env, 'EDGAR_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    rateLimitPerSecond: parseFloatSafe(env, 'EDGAR_RATE_LIMIT_PER_SECOND', DEFAULT_RATE_PER_SECOND, 0.1, 10),
    rateCapacity: parseIntSafe(env, 'EDGAR_RATE_CAPACITY', DEFAULT_RATE_CAPACITY),
    matchThreshold: parseFloatSafe(env, 'INSIDER_MATCH_THRESHOLD', MATCH_THRESHOLD, 0, 1),
    cacheTtlMs: parseIntSafe(env, 'INSIDER_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS) * 1000,
    negativeCacheTtlMs:
      parseIntSafe(env, 'INSIDER_NEGATIVE_CACHE_TTL_SECONDS', DEFAULT_NEGATIVE_CACHE_TTL_SECONDS) * 1000,
    recencyWindowDays: parseIntSafe(env, 'INSIDER_RECENCY_WINDOW_DAYS', DEFAULT_RECENCY_WINDOW_DAYS),
    scanConcurrency: parseIntSafe(env, 'INSIDER_SCAN_CONCURRENCY', DEFAULT_SCAN_CONCURRENCY),
    entityLimit: parseLimit(env, 'INSIDER_ENTITY_LIMIT'),
    deadlineMs: parseIntSafe(env, 'INSIDER_DEADLINE_MS', DEFAULT_DEADLINE_MS),
    graceMs: parseIntSafe(env, 'INSIDER_GRACE_MS', DEFAULT_GRACE_MS, 0),
    searchYearsBack: parseIntSafe(env, 'INSIDER_SEARCH_YEARS_BACK', DEFAULT_SEARCH_YEARS_BACK),
    maxSearchQueries: parseIntSafe(env, 'INSIDER_MAX_SEARCH_QUERIES', DEFAULT_MAX_SEARCH_QUERIES),
    minIndexedMatches: parseIntSafe(env, 'INSIDER_MIN_INDEXED_MATCHES', DEFAULT_MIN_INDEXED_MATCHES, 0),
    filingsPerEntity: parseIntSafe(env, 'INSIDER_FILINGS_PER_ENTITY', DEFAULT_FILINGS_PER_ENTITY),
    minFilings: parseIntSafe(env, 'INSIDER_MIN_FILINGS', DEFAULT_MIN_FILINGS),
  };
}
