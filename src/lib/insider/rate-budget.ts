/**
 * Shared outbound request budget (token bucket).
 *
 * Every request to the filing host takes one token, whichever strategy
 * issues it. Callers queue FIFO; a caller waits for the next refill unless
 * that wait would run past its deadline, in which case it gets `timed_out`.
 * The bucket is never bypassed.
 */

import type { RequestContext } from './types';

export const DEFAULT_RATE_PER_SECOND = 10;
export const DEFAULT_RATE_CAPACITY = 10;

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms, signal) {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};

export type AcquireResult =
  | { ok: true }
  | { ok: false; reason: 'timed_out' | 'cancelled' };

export interface RateBudgetOptions {
  ratePerSecond?: number;
  capacity?: number;
  clock?: Clock;
}

export class RateBudget {
  readonly ratePerSecond: number;
  readonly capacity: number;
  private readonly clock: Clock;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: RateBudgetOptions = {}) {
    this.ratePerSecond = Math.max(0.001, options.ratePerSecond ?? DEFAULT_RATE_PER_SECOND);
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_RATE_CAPACITY);
    this.clock = options.clock ?? systemClock;
    this.tokens = this.capacity;
    this.lastRefill = this.clock.now();
  }

  /**
   * Take one token, waiting in line behind earlier callers
   */
  acquire(context: RequestContext = {}): Promise<AcquireResult> {
    const turn = this.tail.then(() => this.take(context));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Tokens available right now (fractional)
   */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill() {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.ratePerSecond) / 1000);
      this.lastRefill = now;
    }
  }

  private async take({ deadline, signal }: RequestContext): Promise<AcquireResult> {
    for (;;) {
      if (signal?.aborted) return { ok: false, reason: 'cancelled' };

      const now = this.clock.now();
      if (deadline !== undefined && now >= deadline) {
        return { ok: false, reason: 'timed_out' };
      }

      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return { ok: true };
      }

      const waitMs = Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);
      if (deadline !== undefined && now + waitMs > deadline) {
        return { ok: false, reason: 'timed_out' };
      }
      await this.clock.sleep(waitMs, signal);
    }
  }
}
