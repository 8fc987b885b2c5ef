/**
 * Error types for insider identity resolution.
 *
 * Only InvalidQueryError reaches callers of resolveIdentity. The others are
 * recovered inside the orchestrator and surface as diagnostics.
 */

export class InvalidQueryError extends Error {
  constructor(public readonly query: string, reason: string) {
    super(`Invalid query "${query}": ${reason}`);
    this.name = 'InvalidQueryError';
  }
}

/**
 * The indexed search surface is unreachable, returned an error status or a
 * response we could not interpret. Drives the exhaustive fallback.
 */
export class SearchUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchUnavailableError';
  }
}

/**
 * A rate budget token could not be acquired before the request deadline
 */
export class RateLimitedError extends Error {
  constructor(
    message: string,
    public readonly reason: 'timed_out' | 'cancelled' = 'timed_out'
  ) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

export class EdgarHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly retryAfter: string | null = null
  ) {
    super(message);
    this.name = 'EdgarHttpError';
  }
}

export class EdgarResponseShapeError extends Error {
  constructor(public readonly url: string, detail: string) {
    super(`Unexpected response shape from ${url}: ${detail}`);
    this.name = 'EdgarResponseShapeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
