/**
 * Shared types for insider identity resolution.
 *
 * An insider identity is a person whose name appears as the reporting owner
 * on ownership filings (Form 4) of one or more public companies. The corpus
 * is organised per company, so resolution works from the name outwards.
 */

/**
 * Pattern a name variant was generated from
 */
export type NameVariantKind =
  | 'first_last'
  | 'last_comma_first'
  | 'filing_caps'
  | 'filing_caps_middle'
  | 'full'
  | 'nickname'
  | 'single';

export interface NameVariant {
  /** Display form, e.g. "KLAPPA GALE E" */
  form: string;
  kind: NameVariantKind;
  /** Lowercase comparable tokens of `form` */
  tokens: string[];
}

/**
 * A filer (company) in the corpus
 */
export interface Entity {
  /** 10-digit zero padded CIK */
  id: string;
  name: string;
  ticker?: string;
  /** Position in the universe feed, lower is larger */
  rank?: number;
}

export type StrategyName = 'indexed' | 'exhaustive';

export interface FilingEvidence {
  accessionNumber?: string;
  /** ISO date (YYYY-MM-DD) */
  filingDate?: string;
  /** Reporting owner's own CIK, 10 digits */
  ownerCik?: string;
  /** Reporting relationship on this filing, e.g. ["Director", "Chairman & CEO"] */
  roles?: string[];
  source: StrategyName;
}

export interface CandidateMatch {
  entity: Entity;
  filerName: string;
  confidence: number;
  evidence: FilingEvidence[];
  strategy: StrategyName;
}

export type AffiliationStatus = 'current' | 'former' | 'unknown';

export interface Affiliation {
  entity: Entity;
  status: AffiliationStatus;
  confidence: number;
  matchedNames: string[];
  filingCount: number;
  firstFilingDate: string | null;
  lastFilingDate: string | null;
  strategies: StrategyName[];
  /** Distinct reporting owner CIKs seen on the evidence */
  ownerCiks: string[];
  /** Roles from the most recent filing that reports any */
  roles: string[];
}

export type EntityFetchErrorReason = 'fetch_failed' | 'rate_limited' | 'timeout';

export interface EntityFetchError {
  entityId: string;
  entityName: string;
  reason: EntityFetchErrorReason;
  message: string;
}

export type StrategyOutcome = 'ok' | 'empty' | 'partial' | 'unavailable';

export interface StrategyAttempt {
  strategy: StrategyName;
  outcome: StrategyOutcome;
  matchCount: number;
  detail?: string;
}

export type ResolutionState =
  | 'idle'
  | 'cache_check'
  | 'hit_return'
  | 'normalize'
  | 'invalid_query'
  | 'try_indexed'
  | 'try_exhaustive'
  | 'aggregate'
  | 'cache_store'
  | 'done';

export interface ResolutionDiagnostics {
  requestId: string;
  variantsTried: string[];
  strategiesAttempted: StrategyAttempt[];
  entityErrors: EntityFetchError[];
  entitiesScanned: number;
  entitiesSkipped: number;
  deadlineExceeded: boolean;
  cacheHit: boolean;
  states: ResolutionState[];
  durationMs: number;
  message?: string;
}

export type ResolutionStatus = 'resolved' | 'not_found';

export interface ResolvedIdentity {
  status: ResolutionStatus;
  query: string;
  canonicalName: string;
  /** Reporting owner CIK carried by the most evidence, null when none was seen */
  ownerCik: string | null;
  affiliations: Affiliation[];
  confidence: number;
  diagnostics: ResolutionDiagnostics;
  /** ISO timestamp */
  resolvedAt: string;
}

/**
 * Per-request context threaded through every outbound call
 */
export interface RequestContext {
  signal?: AbortSignal;
  /** Epoch ms after which no new request may start */
  deadline?: number;
}

/**
 * A filing returned by the indexed search surface
 */
export interface FilingReference {
  entity: Entity;
  /** Reporting owner name as filed */
  filerName: string;
  filingDate?: string;
  accessionNumber?: string;
  ownerCik?: string;
}

/**
 * A reporting owner name seen on one of an entity's own filings
 */
export interface FilerRecord {
  filerName: string;
  filingDate?: string;
  accessionNumber?: string;
  ownerCik?: string;
  roles?: string[];
}

export interface IndexedSearchRequest extends RequestContext {
  startDate: string;
  endDate: string;
}

export interface IndexedSearchSurface {
  readonly name: string;
  search(term: string, request: IndexedSearchRequest): Promise<FilingReference[]>;
}

export interface EntityFilingFetcher {
  fetchRecentFilers(entity: Entity, context: RequestContext): Promise<FilerRecord[]>;
}

export interface EntityUniverseFeed {
  /**
   * Known entities ordered by rank. `limit` of null means the whole universe.
   */
  listEntities(limit: number | null, context: RequestContext): Promise<Entity[]>;
}
