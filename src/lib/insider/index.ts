/**
 * Insider identity resolution
 *
 * Resolves a person's name to the companies where they file (or filed) as
 * a reporting owner.
 *
 * Usage:
 * ```ts
 * import { resolveIdentity } from '@/lib/insider';
 *
 * const identity = await resolveIdentity('Gale Klappa');
 * for (const affiliation of identity.affiliations) {
 *   console.log(affiliation.entity.name, affiliation.status);
 * }
 * ```
 */

import { getRedisClient } from '@/lib/redis/client';
import {
  IdentityCache,
  MemoryCacheBackend,
  RedisCacheBackend,
  type CacheBackend,
  type CacheRedisClient,
} from './cache';
import { getResolverConfig, type ResolverConfig } from './config';
import { EdgarClient, type FetchLike } from './edgar/client';
import { EdgarCompanyUniverse } from './edgar/company-universe';
import { EdgarEntityFilings } from './edgar/entity-filings';
import { EdgarFullTextSearch } from './edgar/full-text-search';
import { ResolutionOrchestrator, type ResolveOptions } from './orchestrator';
import { RateBudget, type Clock } from './rate-budget';
import type { ScoringWeights } from './scoring';
import { ExhaustiveScanStrategy } from './strategies/exhaustive-scan';
import { IndexedSearchStrategy } from './strategies/indexed-search';
import type {
  Affiliation,
  EntityFilingFetcher,
  EntityUniverseFeed,
  IndexedSearchSurface,
  ResolvedIdentity,
} from './types';

export interface InsiderResolverDeps {
  config?: Partial<ResolverConfig>;
  weights?: ScoringWeights;
  clock?: Clock;
  fetchImpl?: FetchLike;
  /** Redis client for the shared cache; in-memory when absent */
  redis?: CacheRedisClient | null;
  cacheBackend?: CacheBackend;
  /** Replace the full-text search surface; null disables indexed search */
  indexedSurface?: IndexedSearchSurface | null;
  universe?: EntityUniverseFeed;
  filings?: EntityFilingFetcher;
}

export interface InsiderResolver {
  resolveIdentity(name: string, options?: ResolveOptions): Promise<ResolvedIdentity>;
  /** Affiliations classified as current */
  getCurrentPositions(name: string, options?: ResolveOptions): Promise<Affiliation[]>;
  readonly cache: IdentityCache;
  readonly budget: RateBudget;
  readonly config: ResolverConfig;
}

export function createInsiderResolver(deps: InsiderResolverDeps = {}): InsiderResolver {
  const config: ResolverConfig = { ...getResolverConfig(), ...deps.config };

  const budget = new RateBudget({
    ratePerSecond: config.rateLimitPerSecond,
    capacity: config.rateCapacity,
    clock: deps.clock,
  });
  const client = new EdgarClient({
    userAgent: config.userAgent,
    budget,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl: deps.fetchImpl,
    clock: deps.clock,
  });

  const backend =
    deps.cacheBackend ?? (deps.redis ? new RedisCacheBackend(deps.redis) : new MemoryCacheBackend(deps.clock));
  const cache = new IdentityCache({
    backend,
    clock: deps.clock,
    positiveTtlMs: config.cacheTtlMs,
    negativeTtlMs: config.negativeCacheTtlMs,
  });

  const surface = deps.indexedSurface === undefined ? new EdgarFullTextSearch(client) : deps.indexedSurface;
  const indexed = surface
    ? new IndexedSearchStrategy(surface, {
        maxSearchQueries: config.maxSearchQueries,
        searchYearsBack: config.searchYearsBack,
        threshold: config.matchThreshold,
        weights: deps.weights,
        clock: deps.clock,
      })
    : null;

  const exhaustive = new ExhaustiveScanStrategy(
    deps.universe ?? new EdgarCompanyUniverse(client),
    deps.filings ?? new EdgarEntityFilings(client, config.filingsPerEntity),
    { threshold: config.matchThreshold, weights: deps.weights, clock: deps.clock }
  );

  const orchestrator = new ResolutionOrchestrator({ indexed, exhaustive, cache, config, clock: deps.clock });

  return {
    resolveIdentity: (name, options) => orchestrator.resolve(name, options),
    async getCurrentPositions(name, options) {
      const identity = await orchestrator.resolve(name, options);
      return identity.affiliations.filter((affiliation) => affiliation.status === 'current');
    },
    cache,
    budget,
    config,
  };
}

let defaultResolver: InsiderResolver | null = null;

function getDefaultResolver(): InsiderResolver {
  defaultResolver ??= createInsiderResolver({ redis: getRedisClient() });
  return defaultResolver;
}

/**
 * Resolve a name with the process-wide resolver (env config, Redis cache
 * when configured)
 */
export function resolveIdentity(name: string, options?: ResolveOptions): Promise<ResolvedIdentity> {
  return getDefaultResolver().resolveIdentity(name, options);
}

export function getCurrentPositions(name: string, options?: ResolveOptions): Promise<Affiliation[]> {
  return getDefaultResolver().getCurrentPositions(name, options);
}

export { MATCH_THRESHOLD, scoreCandidate, scoreBreakdown, isMatch } from './scoring';
export { normalizeName, canonicalQueryName } from './name-variants';
export { canonicalCacheKey, IdentityCache, MemoryCacheBackend, RedisCacheBackend } from './cache';
export { RateBudget } from './rate-budget';
export { InvalidQueryError, SearchUnavailableError, RateLimitedError } from './errors';
export type { ResolveOptions } from './orchestrator';
export type { ResolverConfig } from './config';
export type * from './types';
