import type { Config } from '../shared/config.js';

export type QuotaDecision = { action: 'retry'; delayMs: number } | { action: 'skip' };

export interface QuotaContext {
  username: string;
  /** 1 for the first quota hit on this call, 2 for the second, ... */
  attempt: number;
  /** Provider hint for when the window reopens, if it sent one. */
  retryAfterMs?: number;
}

/**
 * What to do when the provider says the quota is exhausted.
 */
export interface QuotaPolicy {
  readonly name: string;
  onQuotaExceeded(ctx: QuotaContext): QuotaDecision;
}

/**
 * Abandon the call and move on. Keeps the batch moving on schedule at the
 * cost of the account's posts for this cycle.
 */
export class SkipPolicy implements QuotaPolicy {
  readonly name = 'skip';

  onQuotaExceeded(): QuotaDecision {
    return { action: 'skip' };
  }
}

export interface BackoffOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff: base, 2×base, 4×base … capped at maxDelayMs, or the
 * provider's retry-after when that is longer. Skips once retries run out.
 */
export class BackoffPolicy implements QuotaPolicy {
  readonly name = 'backoff';

  constructor(private readonly opts: BackoffOptions) {}

  onQuotaExceeded(ctx: QuotaContext): QuotaDecision {
    if (ctx.attempt > this.opts.maxRetries) return { action: 'skip' };

    const exponential = this.opts.baseDelayMs * 2 ** (ctx.attempt - 1);
    const wanted = Math.max(exponential, ctx.retryAfterMs ?? 0);
    return { action: 'retry', delayMs: Math.min(this.opts.maxDelayMs, wanted) };
  }
}

export function createQuotaPolicy(config: Config['quota']): QuotaPolicy {
  switch (config.policy) {
    case 'backoff':
      return new BackoffPolicy({
        maxRetries: config.max_retries,
        baseDelayMs: config.base_delay_ms,
        maxDelayMs: config.max_delay_ms,
      });
    case 'skip':
      return new SkipPolicy();
  }
}
