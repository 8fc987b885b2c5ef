/**
 * Indexed Search Strategy
 *
 * Asks the full-text search surface for filings mentioning the top name
 * variants, groups the hits by entity and scores the reporting owner names.
 * Cheap and usually enough; when the surface is down or finds nothing the
 * orchestrator falls back to the exhaustive scan.
 */

import { format, subYears } from 'date-fns';
import { createLogger } from '@/lib/logger';
import { SearchUnavailableError, errorMessage } from '../errors';
import { systemClock, type Clock } from '../rate-budget';
import type { ScoringWeights } from '../scoring';
import type {
  CandidateMatch,
  Entity,
  FilerRecord,
  IndexedSearchSurface,
  NameVariant,
  RequestContext,
} from '../types';
import { matchFilers } from './matching';

const log = createLogger('IndexedSearch');

export interface IndexedSearchOptions {
  maxSearchQueries: number;
  searchYearsBack: number;
  threshold: number;
  weights?: ScoringWeights;
  clock?: Clock;
}

export interface IndexedSearchOutcome {
  matches: CandidateMatch[];
  queriesIssued: number;
  queriesFailed: number;
}

/**
 * Distinct search terms, in variant order. Terms differing only in case
 * are one query.
 */
export function searchTerms(variants: readonly NameVariant[], maxQueries: number): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const variant of variants) {
    const key = variant.form.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    terms.push(variant.form);
    if (terms.length >= maxQueries) break;
  }
  return terms;
}

export class IndexedSearchStrategy {
  private readonly clock: Clock;

  constructor(
    private readonly surface: IndexedSearchSurface,
    private readonly options: IndexedSearchOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Throws SearchUnavailableError only when every query failed
   */
  async search(variants: readonly NameVariant[], context: RequestContext): Promise<IndexedSearchOutcome> {
    const now = new Date(this.clock.now());
    const request = {
      ...context,
      startDate: format(subYears(now, this.options.searchYearsBack), 'yyyy-MM-dd'),
      endDate: format(now, 'yyyy-MM-dd'),
    };

    const byEntity = new Map<string, { entity: Entity; records: FilerRecord[] }>();
    const failures: string[] = [];
    let queriesIssued = 0;

    for (const term of searchTerms(variants, this.options.maxSearchQueries)) {
      if (context.signal?.aborted) break;
      queriesIssued++;

      try {
        const references = await this.surface.search(term, request);
        for (const reference of references) {
          const group = byEntity.get(reference.entity.id) ?? { entity: reference.entity, records: [] };
          group.records.push({
            filerName: reference.filerName,
            ...(reference.filingDate ? { filingDate: reference.filingDate } : {}),
            ...(reference.accessionNumber ? { accessionNumber: reference.accessionNumber } : {}),
            ...(reference.ownerCik ? { ownerCik: reference.ownerCik } : {}),
          });
          byEntity.set(reference.entity.id, group);
        }
      } catch (error) {
        log.warn({ surface: this.surface.name, term, error: errorMessage(error) }, 'Indexed search query failed');
        failures.push(errorMessage(error));
      }
    }

    if (queriesIssued > 0 && failures.length === queriesIssued) {
      throw new SearchUnavailableError(
        `All ${queriesIssued} ${this.surface.name} queries failed: ${failures[0]}`
      );
    }

    const matches: CandidateMatch[] = [];
    for (const { entity, records } of byEntity.values()) {
      matches.push(
        ...matchFilers(entity, records, variants, 'indexed', {
          threshold: this.options.threshold,
          weights: this.options.weights,
        })
      );
    }

    log.debug(
      { surface: this.surface.name, queriesIssued, queriesFailed: failures.length, matches: matches.length },
      'Indexed search complete'
    );

    return { matches, queriesIssued, queriesFailed: failures.length };
  }
}
