/**
 * Aggregation of candidate matches into affiliations.
 *
 * Matches from both strategies are merged per entity. The entity keeps the
 * confidence of its best match; ties go to the match with the latest
 * filing, then to the lexically first filer name. Status comes from how
 * recent the latest dated filing is.
 *
 * Filings that carry the reporting owner's CIK also vote on which owner the
 * identity is; the CIK seen on the most filings wins.
 */

import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';
import { canonicalQueryName } from './name-variants';
import type {
  Affiliation,
  AffiliationStatus,
  CandidateMatch,
  Entity,
  FilingEvidence,
  StrategyName,
} from './types';

export interface AggregateOptions {
  recencyWindowDays: number;
  /** Entities with fewer evidence filings are dropped */
  minFilings: number;
  now: Date;
}

export interface AggregateResult {
  affiliations: Affiliation[];
  canonicalName: string;
  /** Highest affiliation confidence, 0 when there is none */
  confidence: number;
  ownerCik: string | null;
}

const STRATEGY_ORDER: StrategyName[] = ['indexed', 'exhaustive'];

export function classifyAffiliation(
  lastFilingDate: string | null,
  now: Date,
  recencyWindowDays: number
): AffiliationStatus {
  if (!lastFilingDate) return 'unknown';
  const filed = parseISO(lastFilingDate);
  if (!isValid(filed)) return 'unknown';
  return differenceInCalendarDays(now, filed) <= recencyWindowDays ? 'current' : 'former';
}

function latestDate(evidence: readonly FilingEvidence[]): string | null {
  let latest: string | null = null;
  for (const item of evidence) {
    if (item.filingDate && (latest === null || item.filingDate > latest)) {
      latest = item.filingDate;
    }
  }
  return latest;
}

function earliestDate(evidence: readonly FilingEvidence[]): string | null {
  let earliest: string | null = null;
  for (const item of evidence) {
    if (item.filingDate && (earliest === null || item.filingDate < earliest)) {
      earliest = item.filingDate;
    }
  }
  return earliest;
}

/**
 * Higher confidence first, then latest filing, then filer name
 */
function compareMatches(a: CandidateMatch, b: CandidateMatch): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  const aLatest = latestDate(a.evidence) ?? '';
  const bLatest = latestDate(b.evidence) ?? '';
  if (aLatest !== bLatest) return aLatest < bLatest ? 1 : -1;
  return a.filerName.localeCompare(b.filerName);
}

function mergeEvidence(matches: readonly CandidateMatch[]): FilingEvidence[] {
  const merged: FilingEvidence[] = [];
  const seenAccessions = new Set<string>();
  for (const match of matches) {
    for (const item of match.evidence) {
      if (item.accessionNumber) {
        if (seenAccessions.has(item.accessionNumber)) continue;
        seenAccessions.add(item.accessionNumber);
      }
      merged.push(item);
    }
  }
  return merged;
}

/**
 * Best match's entity, with ticker and rank filled in from the others
 */
function mergeEntity(ranked: readonly CandidateMatch[]): Entity {
  const entity: Entity = { ...ranked[0].entity };
  for (const { entity: other } of ranked) {
    if (entity.ticker === undefined && other.ticker !== undefined) entity.ticker = other.ticker;
    if (entity.rank === undefined && other.rank !== undefined) entity.rank = other.rank;
  }
  return entity;
}

/**
 * Roles of the latest dated filing that reports any, else of the first that does
 */
function latestRoles(evidence: readonly FilingEvidence[]): string[] {
  let chosen: FilingEvidence | null = null;
  for (const item of evidence) {
    if (!item.roles || item.roles.length === 0) continue;
    if (!chosen || (item.filingDate ?? '') > (chosen.filingDate ?? '')) chosen = item;
  }
  return chosen?.roles ? [...chosen.roles] : [];
}

function distinctOwnerCiks(evidence: readonly FilingEvidence[]): string[] {
  const ciks: string[] = [];
  for (const item of evidence) {
    if (item.ownerCik && !ciks.includes(item.ownerCik)) ciks.push(item.ownerCik);
  }
  return ciks;
}

/**
 * Owner CIK on the most filings, ties to the lexically first
 */
function chooseOwnerCik(evidence: readonly FilingEvidence[]): string | null {
  const counts = new Map<string, number>();
  for (const item of evidence) {
    if (item.ownerCik) counts.set(item.ownerCik, (counts.get(item.ownerCik) ?? 0) + 1);
  }
  let best: { cik: string; count: number } | null = null;
  for (const [cik, count] of counts) {
    if (!best || count > best.count || (count === best.count && cik < best.cik)) {
      best = { cik, count };
    }
  }
  return best ? best.cik : null;
}

function compareAffiliations(a: Affiliation, b: Affiliation): number {
  const aLast = a.lastFilingDate ?? '';
  const bLast = b.lastFilingDate ?? '';
  if (aLast !== bLast) return aLast < bLast ? 1 : -1;
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  return a.entity.id.localeCompare(b.entity.id);
}

/**
 * Most frequent filer name across kept matches, weighted by filings.
 * Ties go to the higher confidence, then the lexically first name.
 */
function chooseCanonicalName(matches: readonly CandidateMatch[]): string | null {
  const stats = new Map<string, { filings: number; confidence: number }>();
  for (const match of matches) {
    const current = stats.get(match.filerName) ?? { filings: 0, confidence: 0 };
    current.filings += Math.max(1, match.evidence.length);
    current.confidence = Math.max(current.confidence, match.confidence);
    stats.set(match.filerName, current);
  }

  let best: { name: string; filings: number; confidence: number } | null = null;
  for (const [name, { filings, confidence }] of stats) {
    if (
      !best ||
      filings > best.filings ||
      (filings === best.filings && confidence > best.confidence) ||
      (filings === best.filings && confidence === best.confidence && name.localeCompare(best.name) < 0)
    ) {
      best = { name, filings, confidence };
    }
  }
  return best ? best.name : null;
}

export function aggregateMatches(
  query: string,
  matches: readonly CandidateMatch[],
  options: AggregateOptions
): AggregateResult {
  const byEntity = new Map<string, CandidateMatch[]>();
  for (const match of matches) {
    const group = byEntity.get(match.entity.id) ?? [];
    group.push(match);
    byEntity.set(match.entity.id, group);
  }

  const affiliations: Affiliation[] = [];
  const keptMatches: CandidateMatch[] = [];
  const keptEvidence: FilingEvidence[] = [];

  for (const group of byEntity.values()) {
    const ranked = [...group].sort(compareMatches);
    const best = ranked[0];
    const evidence = mergeEvidence(ranked);
    if (evidence.length < options.minFilings) continue;

    const lastFilingDate = latestDate(evidence);
    const matchedNames = [...new Set(ranked.map((match) => match.filerName))];
    const strategies = STRATEGY_ORDER.filter((strategy) =>
      ranked.some((match) => match.strategy === strategy || match.evidence.some((item) => item.source === strategy))
    );

    affiliations.push({
      entity: mergeEntity(ranked),
      status: classifyAffiliation(lastFilingDate, options.now, options.recencyWindowDays),
      confidence: best.confidence,
      matchedNames,
      filingCount: evidence.length,
      firstFilingDate: earliestDate(evidence),
      lastFilingDate,
      strategies,
      ownerCiks: distinctOwnerCiks(evidence),
      roles: latestRoles(evidence),
    });
    keptMatches.push(...ranked);
    keptEvidence.push(...evidence);
  }

  affiliations.sort(compareAffiliations);

  return {
    affiliations,
    canonicalName: chooseCanonicalName(keptMatches) ?? canonicalQueryName(query),
    confidence: affiliations.reduce((max, affiliation) => Math.max(max, affiliation.confidence), 0),
    ownerCik: chooseOwnerCik(keptEvidence),
  };
}
