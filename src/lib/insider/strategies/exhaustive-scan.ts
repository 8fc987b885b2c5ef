/**
 * Exhaustive Scan Strategy
 *
 * Walks the entity universe with a bounded worker pool, fetching each
 * entity's recent reporting owners and scoring them against the variants.
 * A failing entity is recorded and skipped. Once the scan is cancelled no
 * new entity is dispatched; fetches already running get `graceMs` to finish
 * and are then abandoned as timeouts.
 */

import { createLogger } from '@/lib/logger';
import { RateLimitedError, SearchUnavailableError, errorMessage } from '../errors';
import { systemClock, type Clock } from '../rate-budget';
import type { ScoringWeights } from '../scoring';
import type {
  CandidateMatch,
  Entity,
  EntityFetchError,
  EntityFetchErrorReason,
  EntityFilingFetcher,
  EntityUniverseFeed,
  FilerRecord,
  NameVariant,
  RequestContext,
} from '../types';
import { matchFilers } from './matching';

const log = createLogger('ExhaustiveScan');

export interface ExhaustiveScanOptions {
  threshold: number;
  weights?: ScoringWeights;
  clock?: Clock;
}

export interface ScanRequest {
  concurrencyLimit: number;
  /** Scan only the top `entityLimit` entities by rank; null scans all */
  entityLimit: number | null;
  signal?: AbortSignal;
  /** Epoch ms */
  deadline?: number;
  graceMs: number;
}

export interface ScanOutcome {
  matches: CandidateMatch[];
  errors: EntityFetchError[];
  entitiesScanned: number;
  entitiesSkipped: number;
  cancelled: boolean;
}

type FetchSettlement =
  | { kind: 'ok'; records: FilerRecord[] }
  | { kind: 'error'; error: unknown }
  | { kind: 'abandoned' };

function classifyFailure(error: unknown, aborted: boolean): EntityFetchErrorReason {
  if (error instanceof RateLimitedError) {
    return error.reason === 'cancelled' ? 'timeout' : 'rate_limited';
  }
  return aborted ? 'timeout' : 'fetch_failed';
}

export class ExhaustiveScanStrategy {
  private readonly clock: Clock;

  constructor(
    private readonly universe: EntityUniverseFeed,
    private readonly fetcher: EntityFilingFetcher,
    private readonly options: ExhaustiveScanOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  private async loadEntities(limit: number | null, context: RequestContext): Promise<Entity[]> {
    let entities: Entity[];
    try {
      entities = await this.universe.listEntities(limit, context);
    } catch (error) {
      throw new SearchUnavailableError(`Entity universe unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return limit === null ? entities : entities.slice(0, limit);
  }

  async scan(variants: readonly NameVariant[], request: ScanRequest): Promise<ScanOutcome> {
    const controller = new AbortController();
    const { signal } = controller;
    const onCallerAbort = () => controller.abort();
    if (request.signal?.aborted) controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const deadlineTimer =
      request.deadline !== undefined
        ? setTimeout(() => controller.abort(), Math.max(0, request.deadline - this.clock.now()))
        : null;

    const timers: { grace?: ReturnType<typeof setTimeout> } = {};
    const abandoned = new Promise<FetchSettlement>((resolve) => {
      const startGrace = () => {
        timers.grace = setTimeout(() => resolve({ kind: 'abandoned' }), request.graceMs);
      };
      if (signal.aborted) startGrace();
      else signal.addEventListener('abort', startGrace, { once: true });
    });

    const context = { signal, deadline: request.deadline };

    try {
      const entities = await this.loadEntities(request.entityLimit, context);

      const matches: CandidateMatch[] = [];
      const errors: EntityFetchError[] = [];
      let next = 0;
      let dispatched = 0;
      let scanned = 0;

      const worker = async () => {
        while (next < entities.length && !signal.aborted) {
          const entity = entities[next++];
          dispatched++;

          const pending: Promise<FetchSettlement> = this.fetcher.fetchRecentFilers(entity, context).then(
            (records): FetchSettlement => ({ kind: 'ok', records }),
            (error: unknown): FetchSettlement => ({ kind: 'error', error })
          );
          const settled = await Promise.race([pending, abandoned]);

          if (settled.kind === 'ok') {
            scanned++;
            matches.push(...matchFilers(entity, settled.records, variants, 'exhaustive', {
                threshold: this.options.threshold,
                weights: this.options.weights,
              }));
          } else if (settled.kind === 'abandoned') {
            errors.push({
              entityId: entity.id,
              entityName: entity.name,
              reason: 'timeout',
              message: `Abandoned after ${request.graceMs}ms grace period`,
            });
          } else {
            const reason = classifyFailure(settled.error, signal.aborted);
            log.warn({ entityId: entity.id, reason, error: errorMessage(settled.error) }, 'Entity fetch failed');
            errors.push({
              entityId: entity.id,
              entityName: entity.name,
              reason,
              message: errorMessage(settled.error),
            });
          }
        }
      };

      const poolSize = Math.min(Math.max(1, request.concurrencyLimit), entities.length);
      await Promise.all(Array.from({ length: poolSize }, () => worker()));

      const outcome: ScanOutcome = {
        matches,
        errors,
        entitiesScanned: scanned,
        entitiesSkipped: entities.length - dispatched,
        cancelled: signal.aborted,
      };

      log.debug(
        {
          entities: entities.length,
          scanned,
          skipped: outcome.entitiesSkipped,
          errors: errors.length,
          matches: matches.length,
          cancelled: outcome.cancelled,
        },
        'Exhaustive scan complete'
      );
      return outcome;
    } finally {
      if (deadlineTimer) clearTimeout(deadlineTimer);
      if (timers.grace) clearTimeout(timers.grace);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
