/**
 * Resolution Orchestrator
 *
 * Drives one resolution through its states:
 *
 *   idle -> cache_check -> hit_return
 *                       -> normalize -> invalid_query
 *                                    -> try_indexed -> [try_exhaustive] -> aggregate -> cache_store -> done
 *
 * The indexed search is preferred. The exhaustive scan runs when the search
 * surface is unavailable, or when `fallbackOnEmpty` is set and the search
 * either found fewer than `minIndexedMatches` matches or had failed queries.
 * Anything short of an unusable name ends in a result, `not_found`
 * included; an exceeded deadline still aggregates whatever was matched
 * before it. Results that may be missing affiliations are cached with the
 * negative TTL.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import { aggregateMatches } from './aggregate';
import { canonicalCacheKey, type IdentityCache } from './cache';
import type { ResolverConfig } from './config';
import { InvalidQueryError, SearchUnavailableError, errorMessage } from './errors';
import { normalizeName } from './name-variants';
import { systemClock, type Clock } from './rate-budget';
import type { ExhaustiveScanStrategy } from './strategies/exhaustive-scan';
import type { IndexedSearchStrategy } from './strategies/indexed-search';
import type {
  CandidateMatch,
  EntityFetchError,
  NameVariant,
  ResolutionDiagnostics,
  ResolutionState,
  ResolvedIdentity,
  StrategyAttempt,
} from './types';

const log = createLogger('InsiderResolver');

const resolveOptionsSchema = z
  .object({
    fallbackOnEmpty: z.boolean().optional(),
    entityLimit: z.number().int().positive().nullable().optional(),
    deadlineMs: z.number().int().positive().optional(),
    concurrencyLimit: z.number().int().positive().max(64).optional(),
    forceRefresh: z.boolean().optional(),
  })
  .strict();

export type ResolveOptions = z.infer<typeof resolveOptionsSchema>;

interface EffectiveOptions {
  fallbackOnEmpty: boolean;
  entityLimit: number | null;
  deadlineMs: number;
  concurrencyLimit: number;
  forceRefresh: boolean;
}

export interface OrchestratorDeps {
  /** null skips straight to the exhaustive scan */
  indexed: IndexedSearchStrategy | null;
  exhaustive: ExhaustiveScanStrategy;
  cache: IdentityCache;
  config: ResolverConfig;
  clock?: Clock;
}

interface ResolutionRun {
  requestId: string;
  query: string;
  cacheKey: string;
  options: EffectiveOptions;
  states: ResolutionState[];
  startedAt: number;
}

export class ResolutionOrchestrator {
  private readonly clock: Clock;
  private readonly inflight = new Map<string, Promise<ResolvedIdentity>>();

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Resolve a name. Throws InvalidQueryError for unusable names or options;
   * every other failure ends in a `not_found` result. Identical concurrent
   * calls share one resolution.
   */
  resolve(query: string, options: ResolveOptions = {}): Promise<ResolvedIdentity> {
    let effective: EffectiveOptions;
    try {
      effective = this.effectiveOptions(query, options);
    } catch (error) {
      return Promise.reject(error);
    }
    const cacheKey = canonicalCacheKey(query);
    const inflightKey = `${cacheKey}|${JSON.stringify(effective)}`;

    const existing = this.inflight.get(inflightKey);
    if (existing) {
      log.debug({ cacheKey }, 'Joining in-flight resolution');
      return existing;
    }

    const run = this.run({
      requestId: uuidv4(),
      query,
      cacheKey,
      options: effective,
      states: ['idle'],
      startedAt: this.clock.now(),
    }).finally(() => {
      this.inflight.delete(inflightKey);
    });
    this.inflight.set(inflightKey, run);
    return run;
  }

  private effectiveOptions(query: string, options: ResolveOptions): EffectiveOptions {
    const parsed = resolveOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
        .join('; ');
      throw new InvalidQueryError(query, `invalid options (${detail})`);
    }

    const { config } = this.deps;
    return {
      fallbackOnEmpty: parsed.data.fallbackOnEmpty ?? true,
      entityLimit: parsed.data.entityLimit === undefined ? config.entityLimit : parsed.data.entityLimit,
      deadlineMs: parsed.data.deadlineMs ?? config.deadlineMs,
      concurrencyLimit: parsed.data.concurrencyLimit ?? config.scanConcurrency,
      forceRefresh: parsed.data.forceRefresh ?? false,
    };
  }

  private async run(run: ResolutionRun): Promise<ResolvedIdentity> {
    const { cache } = this.deps;

    if (!run.options.forceRefresh) {
      run.states.push('cache_check');
      const lookup = await cache.get(run.cacheKey);
      if (lookup.hit) {
        run.states.push('hit_return', 'done');
        log.debug({ requestId: run.requestId, cacheKey: run.cacheKey }, 'Identity cache hit');
        return {
          ...lookup.value,
          diagnostics: {
            ...lookup.value.diagnostics,
            requestId: run.requestId,
            cacheHit: true,
            states: [...run.states],
            durationMs: this.clock.now() - run.startedAt,
          },
        };
      }
    }

    run.states.push('normalize');
    const variants = normalizeName(run.query);
    if (variants.length === 0) {
      run.states.push('invalid_query');
      log.info({ requestId: run.requestId, query: run.query }, 'Rejected query with no usable name');
      throw new InvalidQueryError(run.query, 'no usable name tokens');
    }

    const controller = new AbortController();
    const deadline = this.clock.now() + run.options.deadlineMs;
    const deadlineTimer = setTimeout(() => controller.abort(), run.options.deadlineMs);

    try {
      const gathered = await this.gather(run, variants, controller.signal, deadline);
      return await this.finish(run, variants, gathered, controller.signal.aborted);
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  private async gather(
    run: ResolutionRun,
    variants: NameVariant[],
    signal: AbortSignal,
    deadline: number
  ): Promise<GatheredMatches> {
    const { indexed, exhaustive, config } = this.deps;
    const gathered: GatheredMatches = {
      matches: [],
      attempts: [],
      entityErrors: [],
      entitiesScanned: 0,
      entitiesSkipped: 0,
      incomplete: false,
    };

    let needFallback = indexed === null;

    if (indexed) {
      run.states.push('try_indexed');
      try {
        const outcome = await indexed.search(variants, { signal, deadline });
        gathered.matches.push(...outcome.matches);
        gathered.attempts.push({
          strategy: 'indexed',
          outcome: outcome.queriesFailed > 0 ? 'partial' : outcome.matches.length > 0 ? 'ok' : 'empty',
          matchCount: outcome.matches.length,
          detail: `${outcome.queriesIssued} queries, ${outcome.queriesFailed} failed`,
        });
        needFallback =
          run.options.fallbackOnEmpty &&
          (outcome.matches.length < config.minIndexedMatches || outcome.queriesFailed > 0);
        gathered.incomplete = outcome.queriesFailed > 0;
      } catch (error) {
        if (!(error instanceof SearchUnavailableError)) {
          log.error({ requestId: run.requestId, error: errorMessage(error) }, 'Indexed search crashed');
        } else {
          log.warn({ requestId: run.requestId, error: error.message }, 'Indexed search unavailable, falling back');
        }
        gathered.attempts.push({
          strategy: 'indexed',
          outcome: 'unavailable',
          matchCount: 0,
          detail: errorMessage(error),
        });
        needFallback = true;
      }
    }

    if (!needFallback) return gathered;

    run.states.push('try_exhaustive');
    try {
      const scan = await exhaustive.scan(variants, {
        concurrencyLimit: run.options.concurrencyLimit,
        entityLimit: run.options.entityLimit,
        signal,
        deadline,
        graceMs: config.graceMs,
      });
      gathered.matches.push(...scan.matches);
      gathered.entityErrors.push(...scan.errors);
      gathered.entitiesScanned = scan.entitiesScanned;
      gathered.entitiesSkipped = scan.entitiesSkipped;
      gathered.incomplete = scan.errors.length > 0 || scan.cancelled;
      gathered.attempts.push({
        strategy: 'exhaustive',
        outcome:
          scan.errors.length > 0 || scan.cancelled ? 'partial' : scan.matches.length > 0 ? 'ok' : 'empty',
        matchCount: scan.matches.length,
        detail: `${scan.entitiesScanned} scanned, ${scan.entitiesSkipped} skipped, ${scan.errors.length} errors`,
      });
    } catch (error) {
      log.error({ requestId: run.requestId, error: errorMessage(error) }, 'Exhaustive scan unavailable');
      gathered.attempts.push({
        strategy: 'exhaustive',
        outcome: 'unavailable',
        matchCount: 0,
        detail: errorMessage(error),
      });
      gathered.incomplete = true;
    }

    return gathered;
  }

  private async finish(
    run: ResolutionRun,
    variants: NameVariant[],
    gathered: GatheredMatches,
    deadlineExceeded: boolean
  ): Promise<ResolvedIdentity> {
    const { cache, config } = this.deps;

    run.states.push('aggregate');
    const now = this.clock.now();
    const aggregate = aggregateMatches(run.query, gathered.matches, {
      recencyWindowDays: config.recencyWindowDays,
      minFilings: config.minFilings,
      now: new Date(now),
    });

    const variantsTried = variants.map((variant) => variant.form);
    const status = aggregate.affiliations.length > 0 ? 'resolved' : 'not_found';

    run.states.push('cache_store');
    const diagnostics: ResolutionDiagnostics = {
      requestId: run.requestId,
      variantsTried,
      strategiesAttempted: gathered.attempts,
      entityErrors: gathered.entityErrors,
      entitiesScanned: gathered.entitiesScanned,
      entitiesSkipped: gathered.entitiesSkipped,
      deadlineExceeded,
      cacheHit: false,
      states: [...run.states],
      durationMs: now - run.startedAt,
      ...(status === 'not_found'
        ? { message: `No filings found for "${run.query}". Name variations tried: ${variantsTried.join(', ')}` }
        : {}),
    };

    const identity: ResolvedIdentity = {
      status,
      query: run.query,
      canonicalName: aggregate.canonicalName,
      ownerCik: aggregate.ownerCik,
      affiliations: aggregate.affiliations,
      confidence: aggregate.confidence,
      diagnostics,
      resolvedAt: new Date(now).toISOString(),
    };

    // A cut-short or partial result is only kept as long as a miss
    const shortLived = deadlineExceeded || gathered.incomplete;
    await cache.put(run.cacheKey, identity, shortLived ? cache.negativeTtlMs : undefined);

    run.states.push('done');
    diagnostics.states = [...run.states];

    log.info(
      {
        requestId: run.requestId,
        status,
        affiliations: aggregate.affiliations.length,
        entityErrors: gathered.entityErrors.length,
        deadlineExceeded,
        durationMs: diagnostics.durationMs,
      },
      'Identity resolution complete'
    );

    return identity;
  }
}

interface GatheredMatches {
  matches: CandidateMatch[];
  attempts: StrategyAttempt[];
  entityErrors: EntityFetchError[];
  entitiesScanned: number;
  entitiesSkipped: number;
  /** Some source failed or was cut short, so affiliations may be missing */
  incomplete: boolean;
}
