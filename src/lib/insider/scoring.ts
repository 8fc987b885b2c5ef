/**
 * Match Scoring
 *
 * Scores a filer name as printed on a filing against the variant set of a
 * query. The filer name loses its honorifics and suffixes first, like the
 * query did. Four signals, best one wins:
 * - exact: same token multiset as some variant (1.0)
 * - token overlap: Jaccard over significant tokens, nicknames folded (<= 0.9)
 * - containment: every variant token present plus one spelled-out middle
 *   name, "KLAPPA GALE EDWARD" (0.85)
 * - edit distance: per-token Levenshtein similarity, only above a floor (<= 0.85)
 *
 * Every signal is order-invariant, so "KLAPPA GALE" and "Gale Klappa" score
 * the same against a fixed variant set.
 */

import { distance } from 'fastest-levenshtein';
import { canonicalToken, comparableTokens, significantTokens } from './name-variants';
import type { NameVariant } from './types';

/**
 * Confidence at or above which a filer name is treated as the queried person
 */
export const MATCH_THRESHOLD = 0.75;

export interface ScoringWeights {
  /** Score for an exact token match */
  exact: number;
  /** Upper bound of the token overlap signal */
  tokenOverlap: number;
  /** Score when the filer name adds a single middle name to a variant */
  containment: number;
  /** Upper bound of the edit distance signal */
  editDistance: number;
  /** Minimum fuzzy similarity before the edit signal counts at all */
  editFloor: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  exact: 1.0,
  tokenOverlap: 0.9,
  containment: 0.85,
  editDistance: 0.85,
  editFloor: 0.8,
};

export interface ScoreBreakdown {
  exact: number;
  tokenOverlap: number;
  containment: number;
  editDistance: number;
  total: number;
  /** Variant form that produced the total, null when nothing scored */
  variant: string | null;
}

const EMPTY_BREAKDOWN: ScoreBreakdown = {
  exact: 0,
  tokenOverlap: 0,
  containment: 0,
  editDistance: 0,
  total: 0,
  variant: null,
};

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function multisetKey(tokens: string[]): string {
  return [...tokens].sort().join(' ');
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Every variant token is present and the candidate adds at most one more
 */
function containsWithMiddleName(variant: Set<string>, candidate: Set<string>): boolean {
  if (variant.size < 2) return false;
  for (const token of variant) {
    if (!candidate.has(token)) return false;
  }
  return candidate.size - variant.size <= 1;
}

function tokenSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - distance(a, b) / maxLen;
}

function directionalSimilarity(from: string[], to: string[]): number {
  let total = 0;
  for (const token of from) {
    let best = 0;
    for (const other of to) {
      best = Math.max(best, tokenSimilarity(token, other));
    }
    total += best;
  }
  return total / Math.max(from.length, to.length);
}

/**
 * Best-pair token similarity, averaged in both directions
 */
function fuzzyTokenSimilarity(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  return (directionalSimilarity(a, b) + directionalSimilarity(b, a)) / 2;
}

function scoreVariant(
  variant: NameVariant,
  candidateTokens: string[],
  weights: ScoringWeights
): ScoreBreakdown {
  const candidateKey = multisetKey(candidateTokens);
  const exact = candidateKey === multisetKey(variant.tokens) ? weights.exact : 0;

  const variantSignificant = significantTokens(variant.tokens).map(canonicalToken);
  const candidateSignificant = significantTokens(candidateTokens).map(canonicalToken);

  const variantSet = new Set(variantSignificant);
  const candidateSet = new Set(candidateSignificant);
  const overlapRatio = jaccard(variantSet, candidateSet);
  const tokenOverlap = overlapRatio * weights.tokenOverlap;

  const containment =
    overlapRatio < 1 && containsWithMiddleName(variantSet, candidateSet) ? weights.containment : 0;

  let editDistance = 0;
  if (overlapRatio < 1) {
    const fuzzy = fuzzyTokenSimilarity(variantSignificant, candidateSignificant);
    if (fuzzy >= weights.editFloor) {
      editDistance = fuzzy * weights.editDistance;
    }
  }

  return {
    exact,
    tokenOverlap,
    containment,
    editDistance,
    total: clamp01(Math.max(exact, tokenOverlap, containment, editDistance)),
    variant: variant.form,
  };
}

/**
 * Component scores of the best-scoring variant for a candidate name
 */
export function scoreBreakdown(
  variants: readonly NameVariant[],
  candidateName: string,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): ScoreBreakdown {
  const candidateTokens = comparableTokens(candidateName);
  if (candidateTokens.length === 0) return { ...EMPTY_BREAKDOWN };

  let best: ScoreBreakdown = { ...EMPTY_BREAKDOWN };
  for (const variant of variants) {
    const breakdown = scoreVariant(variant, candidateTokens, weights);
    if (breakdown.total > best.total) {
      best = breakdown;
    }
  }
  return best;
}

export function scoreCandidate(
  variants: readonly NameVariant[],
  candidateName: string,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  return scoreBreakdown(variants, candidateName, weights).total;
}

export function isMatch(score: number, threshold: number = MATCH_THRESHOLD): boolean {
  return score >= threshold;
}
