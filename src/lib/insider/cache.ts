/**
 * Identity Cache
 *
 * Resolved identities are cached per canonical query. Positive results
 * live for hours, not-found results for minutes so a newly filed name
 * shows up soon. Entries are stored as JSON and validated on the way back
 * in; anything expired or undecodable is a miss and gets deleted.
 */

import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import { errorMessage } from './errors';
import { systemClock, type Clock } from './rate-budget';
import type { ResolvedIdentity } from './types';

const log = createLogger('IdentityCache');

export const DEFAULT_POSITIVE_TTL_MS = 4 * 60 * 60 * 1000;
export const DEFAULT_NEGATIVE_TTL_MS = 15 * 60 * 1000;
export const REDIS_KEY_PREFIX = 'insider:identity:';

export type TtlClass = 'positive' | 'negative';

export interface CacheEntry {
  key: string;
  value: ResolvedIdentity;
  /** Epoch ms */
  createdAt: number;
  ttlMs: number;
  ttlClass: TtlClass;
}

export type CacheLookup =
  | { hit: true; value: ResolvedIdentity; entry: CacheEntry }
  | { hit: false };

/**
 * Raw string storage. Expiry is decided by IdentityCache, a backend only
 * uses the TTL to reclaim space.
 */
export interface CacheBackend {
  read(key: string): Promise<string | null>;
  write(key: string, payload: string, ttlMs: number): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Normalize a raw query into its cache key
 */
export function canonicalCacheKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

// ---------------------------------------------------------------------------
// Entry schema
// ---------------------------------------------------------------------------

const strategyNameSchema = z.enum(['indexed', 'exhaustive']);

const entitySchema = z.object({
  id: z.string(),
  name: z.string(),
  ticker: z.string().optional(),
  rank: z.number().optional(),
});

const affiliationSchema = z.object({
  entity: entitySchema,
  status: z.enum(['current', 'former', 'unknown']),
  confidence: z.number().min(0).max(1),
  matchedNames: z.array(z.string()),
  filingCount: z.number().int().nonnegative(),
  firstFilingDate: z.string().nullable(),
  lastFilingDate: z.string().nullable(),
  strategies: z.array(strategyNameSchema),
  ownerCiks: z.array(z.string()),
  roles: z.array(z.string()),
});

const diagnosticsSchema = z.object({
  requestId: z.string(),
  variantsTried: z.array(z.string()),
  strategiesAttempted: z.array(
    z.object({
      strategy: strategyNameSchema,
      outcome: z.enum(['ok', 'empty', 'partial', 'unavailable']),
      matchCount: z.number().int().nonnegative(),
      detail: z.string().optional(),
    })
  ),
  entityErrors: z.array(
    z.object({
      entityId: z.string(),
      entityName: z.string(),
      reason: z.enum(['fetch_failed', 'rate_limited', 'timeout']),
      message: z.string(),
    })
  ),
  entitiesScanned: z.number().int().nonnegative(),
  entitiesSkipped: z.number().int().nonnegative(),
  deadlineExceeded: z.boolean(),
  cacheHit: z.boolean(),
  states: z.array(
    z.enum([
      'idle',
      'cache_check',
      'hit_return',
      'normalize',
      'invalid_query',
      'try_indexed',
      'try_exhaustive',
      'aggregate',
      'cache_store',
      'done',
    ])
  ),
  durationMs: z.number().nonnegative(),
  message: z.string().optional(),
});

const resolvedIdentitySchema: z.ZodType<ResolvedIdentity> = z.object({
  status: z.enum(['resolved', 'not_found']),
  query: z.string(),
  canonicalName: z.string(),
  ownerCik: z.string().nullable(),
  affiliations: z.array(affiliationSchema),
  confidence: z.number().min(0).max(1),
  diagnostics: diagnosticsSchema,
  resolvedAt: z.string(),
});

const cacheEntrySchema: z.ZodType<CacheEntry> = z.object({
  key: z.string(),
  value: resolvedIdentitySchema,
  createdAt: z.number(),
  ttlMs: z.number().positive(),
  ttlClass: z.enum(['positive', 'negative']),
});

function decodeEntry(payload: string): CacheEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = cacheEntrySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

/**
 * In-process backend. Expired payloads are dropped on read and swept on
 * every write.
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly store = new Map<string, { payload: string; expiresAt: number }>();

  constructor(private readonly clock: Clock = systemClock) {}

  async read(key: string): Promise<string | null> {
    const stored = this.store.get(key);
    if (!stored) return null;
    if (stored.expiresAt <= this.clock.now()) {
      this.store.delete(key);
      return null;
    }
    return stored.payload;
  }

  async write(key: string, payload: string, ttlMs: number = Number.POSITIVE_INFINITY): Promise<void> {
    const now = this.clock.now();
    for (const [storedKey, stored] of this.store) {
      if (stored.expiresAt <= now) this.store.delete(storedKey);
    }
    this.store.set(key, { payload, expiresAt: now + ttlMs });
  }

  async remove(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}

/**
 * The subset of the ioredis client the cache uses
 */
export interface CacheRedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}

export class RedisCacheBackend implements CacheBackend {
  constructor(
    private readonly client: CacheRedisClient,
    private readonly keyPrefix: string = REDIS_KEY_PREFIX
  ) {}

  async read(key: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + key);
  }

  async write(key: string, payload: string, ttlMs: number): Promise<void> {
    const seconds = Math.max(1, Math.ceil(ttlMs / 1000));
    await this.client.setex(this.keyPrefix + key, seconds, payload);
  }

  async remove(key: string): Promise<void> {
    await this.client.del(this.keyPrefix + key);
  }

  async clear(): Promise<void> {
    const keys = await this.client.keys(`${this.keyPrefix}*`);
    if (keys.length > 0) {
      await this.client.del(...keys);
    }
  }
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export interface IdentityCacheOptions {
  backend?: CacheBackend;
  clock?: Clock;
  positiveTtlMs?: number;
  negativeTtlMs?: number;
}

export class IdentityCache {
  private readonly backend: CacheBackend;
  private readonly clock: Clock;
  readonly positiveTtlMs: number;
  readonly negativeTtlMs: number;

  constructor(options: IdentityCacheOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.backend = options.backend ?? new MemoryCacheBackend(this.clock);
    this.positiveTtlMs = options.positiveTtlMs ?? DEFAULT_POSITIVE_TTL_MS;
    this.negativeTtlMs = options.negativeTtlMs ?? DEFAULT_NEGATIVE_TTL_MS;
  }

  /**
   * Backend failures are logged and read as a miss
   */
  async get(key: string): Promise<CacheLookup> {
    let payload: string | null;
    try {
      payload = await this.backend.read(key);
    } catch (error) {
      log.warn({ key, error: errorMessage(error) }, 'Cache read failed');
      return { hit: false };
    }
    if (payload === null) return { hit: false };

    const entry = decodeEntry(payload);
    if (!entry) {
      log.warn({ key }, 'Discarding undecodable cache entry');
      await this.delete(key);
      return { hit: false };
    }

    if (this.clock.now() - entry.createdAt >= entry.ttlMs) {
      await this.delete(key);
      return { hit: false };
    }

    return { hit: true, value: entry.value, entry };
  }

  /**
   * Store a result. Without an explicit TTL, not-found results get the
   * negative TTL.
   */
  async put(key: string, value: ResolvedIdentity, ttlMs?: number): Promise<CacheEntry> {
    const ttlClass: TtlClass = value.status === 'resolved' ? 'positive' : 'negative';
    const entry: CacheEntry = {
      key,
      value,
      createdAt: this.clock.now(),
      ttlMs: ttlMs ?? (ttlClass === 'positive' ? this.positiveTtlMs : this.negativeTtlMs),
      ttlClass,
    };

    try {
      await this.backend.write(key, JSON.stringify(entry), entry.ttlMs);
    } catch (error) {
      log.warn({ key, error: errorMessage(error) }, 'Cache write failed');
    }
    return entry;
  }

  async delete(key: string): Promise<void> {
    try {
      await this.backend.remove(key);
    } catch (error) {
      log.warn({ key, error: errorMessage(error) }, 'Cache delete failed');
    }
  }

  async clear(): Promise<void> {
    await this.backend.clear();
  }
}
