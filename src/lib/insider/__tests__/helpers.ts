/**
 * In-process stand-ins shared by the insider tests
 */

import type { Clock } from '../rate-budget';
import type {
  Entity,
  EntityFilingFetcher,
  EntityUniverseFeed,
  FilerRecord,
  FilingReference,
  IndexedSearchRequest,
  IndexedSearchSurface,
  RequestContext,
  ResolvedIdentity,
} from '../types';

/**
 * Manual clock. `sleep` advances time instantly and records the wait.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current: number = Date.UTC(2024, 5, 1, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number) {
    this.current += ms;
  }
}

export const WEC: Entity = { id: '0000783325', name: 'WEC Energy Group', ticker: 'WEC', rank: 1 };
export const ASB: Entity = { id: '0000007789', name: 'Associated Banc-Corp', ticker: 'ASB', rank: 2 };
export const BMI: Entity = { id: '0000009092', name: 'Badger Meter', ticker: 'BMI', rank: 3 };

/**
 * Entity universe served from memory
 */
export class StaticUniverse implements EntityUniverseFeed {
  calls = 0;

  constructor(private readonly entities: Entity[]) {}

  async listEntities(limit: number | null): Promise<Entity[]> {
    this.calls++;
    return limit === null ? this.entities.slice() : this.entities.slice(0, limit);
  }
}

export class FailingUniverse implements EntityUniverseFeed {
  async listEntities(): Promise<Entity[]> {
    throw new Error('ticker list unreachable');
  }
}

type FilerBehavior = FilerRecord[] | Error | ((context: RequestContext) => Promise<FilerRecord[]>);

/**
 * Per-entity filer records, errors or custom behavior keyed by entity id.
 * Unknown entities have no filings.
 */
export class StaticFilings implements EntityFilingFetcher {
  readonly fetched: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly byEntity: Record<string, FilerBehavior>) {}

  async fetchRecentFilers(entity: Entity, context: RequestContext): Promise<FilerRecord[]> {
    this.fetched.push(entity.id);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      // Yield so concurrent workers overlap
      await new Promise((resolve) => setImmediate(resolve));
      const behavior = this.byEntity[entity.id];
      if (behavior === undefined) return [];
      if (behavior instanceof Error) throw behavior;
      if (typeof behavior === 'function') return await behavior(context);
      return behavior;
    } finally {
      this.inFlight--;
    }
  }
}

type SearchBehavior = FilingReference[] | Error;

/**
 * Search surface answering per term; unknown terms return nothing
 */
export class StaticSearchSurface implements IndexedSearchSurface {
  readonly name = 'static';
  readonly terms: string[] = [];
  readonly requests: IndexedSearchRequest[] = [];

  constructor(private readonly byTerm: Record<string, SearchBehavior> = {}, private readonly fallback: SearchBehavior = []) {}

  async search(term: string, request: IndexedSearchRequest): Promise<FilingReference[]> {
    this.terms.push(term);
    this.requests.push(request);
    const behavior = this.byTerm[term] ?? this.fallback;
    if (behavior instanceof Error) throw behavior;
    return behavior;
  }
}

export function filer(filerName: string, filingDate?: string, accessionNumber?: string): FilerRecord {
  return {
    filerName,
    ...(filingDate ? { filingDate } : {}),
    ...(accessionNumber ? { accessionNumber } : {}),
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function sampleIdentity(status: ResolvedIdentity['status'] = 'resolved'): ResolvedIdentity {
  return {
    status,
    query: 'Gale Klappa',
    canonicalName: status === 'resolved' ? 'KLAPPA GALE E' : 'Gale Klappa',
    ownerCik: status === 'resolved' ? '0001183567' : null,
    affiliations:
      status === 'resolved'
        ? [
            {
              entity: WEC,
              status: 'current',
              confidence: 0.9,
              matchedNames: ['KLAPPA GALE E'],
              filingCount: 1,
              firstFilingDate: '2024-02-15',
              lastFilingDate: '2024-02-15',
              strategies: ['exhaustive'],
              ownerCiks: ['0001183567'],
              roles: ['Director'],
            },
          ]
        : [],
    confidence: status === 'resolved' ? 0.9 : 0,
    diagnostics: {
      requestId: 'req-1',
      variantsTried: ['Gale Klappa', 'Klappa, Gale', 'KLAPPA GALE'],
      strategiesAttempted: [{ strategy: 'exhaustive', outcome: 'ok', matchCount: 1 }],
      entityErrors: [],
      entitiesScanned: 3,
      entitiesSkipped: 0,
      deadlineExceeded: false,
      cacheHit: false,
      states: ['idle', 'cache_check', 'normalize', 'try_exhaustive', 'aggregate', 'cache_store'],
      durationMs: 12,
    },
    resolvedAt: '2024-06-01T12:00:00.000Z',
  };
}
