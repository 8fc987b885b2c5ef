import { DEFAULT_SCORING_WEIGHTS, isMatch, scoreCandidate, type ScoringWeights } from '../scoring';
import type {
  CandidateMatch,
  Entity,
  FilerRecord,
  FilingEvidence,
  NameVariant,
  StrategyName,
} from '../types';

export interface MatchingOptions {
  threshold: number;
  weights?: ScoringWeights;
}

/**
 * Score each distinct filer name seen at one entity and keep those at or
 * above the threshold. Every filer name is its own candidate, so two names
 * scoring the same both survive.
 */
export function matchFilers(
  entity: Entity,
  records: readonly FilerRecord[],
  variants: readonly NameVariant[],
  strategy: StrategyName,
  options: MatchingOptions
): CandidateMatch[] {
  const evidenceByFiler = new Map<string, FilingEvidence[]>();

  for (const record of records) {
    const evidence = evidenceByFiler.get(record.filerName) ?? [];
    const duplicate =
      record.accessionNumber !== undefined &&
      evidence.some((item) => item.accessionNumber === record.accessionNumber);
    if (!duplicate) {
      evidence.push({
        ...(record.accessionNumber ? { accessionNumber: record.accessionNumber } : {}),
        ...(record.filingDate ? { filingDate: record.filingDate } : {}),
        ...(record.ownerCik ? { ownerCik: record.ownerCik } : {}),
        ...(record.roles && record.roles.length > 0 ? { roles: record.roles } : {}),
        source: strategy,
      });
    }
    evidenceByFiler.set(record.filerName, evidence);
  }

  const matches: CandidateMatch[] = [];
  for (const [filerName, evidence] of evidenceByFiler) {
    const confidence = scoreCandidate(variants, filerName, options.weights ?? DEFAULT_SCORING_WEIGHTS);
    if (isMatch(confidence, options.threshold)) {
      matches.push({ entity, filerName, confidence, evidence, strategy });
    }
  }
  return matches;
}
