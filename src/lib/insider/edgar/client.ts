/**
 * EDGAR HTTP client
 *
 * Every outbound request goes through here: it takes a token from the shared
 * RateBudget, sends the declared User-Agent the host requires, applies a
 * per-request timeout on top of the caller's AbortSignal and retries once on
 * 429/503.
 */

import type { z } from 'zod';
import { createLogger } from '@/lib/logger';
import { EdgarHttpError, EdgarResponseShapeError, RateLimitedError } from '../errors';
import { systemClock, type Clock, type RateBudget } from '../rate-budget';
import type { RequestContext } from '../types';

const log = createLogger('EdgarClient');

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface EdgarClientOptions {
  userAgent: string;
  budget: RateBudget;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function retryDelayMs(retryAfter: string | null): number {
  const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
  return Number.isFinite(seconds) ? Math.max(250, seconds * 1000) : 1000;
}

export class EdgarClient {
  private readonly userAgent: string;
  private readonly budget: RateBudget;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;

  constructor(options: EdgarClientOptions) {
    this.userAgent = options.userAgent;
    this.budget = options.budget;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? systemClock;
  }

  /**
   * GET a JSON document and validate it against `schema`
   */
  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    context: RequestContext = {}
  ): Promise<T> {
    const response = await this.request(url, 'application/json', context);

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new EdgarResponseShapeError(url, 'body is not valid JSON');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new EdgarResponseShapeError(url, detail);
    }
    return parsed.data;
  }

  async getText(url: string, context: RequestContext = {}): Promise<string> {
    const response = await this.request(url, 'text/xml, text/html, */*', context);
    return response.text();
  }

  private async request(url: string, accept: string, context: RequestContext): Promise<Response> {
    try {
      return await this.send(url, accept, context);
    } catch (error) {
      // Bounded retry once on 429/503
      if (!(error instanceof EdgarHttpError) || (error.status !== 429 && error.status !== 503)) {
        throw error;
      }

      const delayMs = retryDelayMs(error.retryAfter);
      if (context.deadline !== undefined && this.clock.now() + delayMs > context.deadline) {
        throw error;
      }

      log.warn({ url, status: error.status, delayMs }, 'EDGAR throttled, retrying once');
      await this.clock.sleep(delayMs, context.signal);
      return await this.send(url, accept, context);
    }
  }

  private async send(url: string, accept: string, context: RequestContext): Promise<Response> {
    const token = await this.budget.acquire(context);
    if (!token.ok) {
      throw new RateLimitedError(`Rate budget ${token.reason} before requesting ${url}`, token.reason);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    context.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: accept,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new EdgarHttpError(
          `EDGAR error: ${response.status} ${response.statusText} for ${url}${errorText ? ` - ${errorText.slice(0, 200)}` : ''}`,
          response.status,
          response.headers.get('Retry-After')
        );
      }

      return response;
    } catch (error) {
      if (isAbortError(error) && !context.signal?.aborted) {
        throw new Error(`EDGAR request timed out after ${this.timeoutMs}ms: ${url}`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      context.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
