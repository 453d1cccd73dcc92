import type { Account, AccountIdentity, Post } from './model.js';
import type { FetchTarget, PostProvider, ResolveResult } from './provider.js';
import type { QuotaPolicy } from './quotaPolicy.js';
import type { RunStats, FailureReason } from './stats.js';
import type { Config } from '../shared/config.js';
import { compareNewestFirst } from './model.js';
import { recordFailure } from './stats.js';
import { ProviderError } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { sleep as realSleep } from '../shared/utils.js';

export interface PacingOptions {
  /** Delay before every account after the first. */
  requestDelayMs: number;
  /** Accounts per batch; a cool-down precedes each new batch. */
  batchSize: number;
  batchDelayMs: number;
  /** Pause between resolving an identity and the next call for it. */
  settleDelayMs: number;
  pageSize: number;
}

export function pacingFromConfig(pacing: Config['pacing']): PacingOptions {
  return {
    requestDelayMs: pacing.request_delay_ms,
    batchSize: pacing.batch_size,
    batchDelayMs: pacing.batch_delay_ms,
    settleDelayMs: pacing.settle_delay_ms,
    pageSize: pacing.page_size,
  };
}

export type AccountFetchOutcome =
  | { status: 'ok'; username: string; posts: Post[] }
  | { status: 'failed'; username: string; reason: FailureReason; message: string };

export interface BatchFetchResult {
  /** Posts from every successful account, newest first. */
  posts: Post[];
  outcomes: AccountFetchOutcome[];
  /** True when the signal stopped the batch before every account was tried. */
  aborted: boolean;
}

export interface PacedFetcherOptions {
  provider: PostProvider;
  policy: QuotaPolicy;
  pacing: PacingOptions;
  sleep?: (ms: number) => Promise<void>;
  /** Called as soon as an identity is resolved so the caller can cache it. */
  onIdentityResolved?: (username: string, identity: AccountIdentity) => void;
  logger?: Logger;
}

type QuotaLimited<T> = T | { kind: 'quota_exceeded'; retryAfterMs?: number };

/**
 * Fetches accounts one at a time under the provider's quota. Delays are the
 * only suspension points besides the calls themselves.
 */
export class PacedFetcher {
  private readonly provider: PostProvider;
  private readonly policy: QuotaPolicy;
  private readonly pacing: PacingOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onIdentityResolved?: (username: string, identity: AccountIdentity) => void;
  private readonly logger: Logger;

  constructor(opts: PacedFetcherOptions) {
    this.provider = opts.provider;
    this.policy = opts.policy;
    this.pacing = opts.pacing;
    this.sleep = opts.sleep ?? realSleep;
    this.onIdentityResolved = opts.onIdentityResolved;
    this.logger = opts.logger ?? rootLogger;
  }

  get settleDelayMs(): number {
    return this.pacing.settleDelayMs;
  }

  /** Timed pause through the injected sleep, so callers share one clock. */
  pause(ms: number): Promise<void> {
    return this.sleep(ms);
  }

  /**
   * One identity lookup, run under the quota policy. Successful lookups are
   * reported through onIdentityResolved before returning.
   */
  async resolveAccount(username: string, stats: RunStats): Promise<ResolveResult> {
    const result = await this.underQuotaPolicy(username, stats, () =>
      this.provider.resolveIdentity(username),
    );
    if (result.kind === 'ok') {
      stats.identitiesResolved++;
      this.onIdentityResolved?.(username, result.identity);
    }
    return result;
  }

  /**
   * Fetch posts for one account created at or after `since`. Resolves the
   * upstream id first when it is not cached.
   */
  async fetchAccount(account: Account, since: Date, stats: RunStats): Promise<AccountFetchOutcome> {
    const username = account.username;
    let target: FetchTarget;

    if (account.user_id) {
      target = { userId: account.user_id, username, displayName: account.display_name };
    } else {
      const resolved = await this.resolveAccount(username, stats);
      if (resolved.kind !== 'ok') {
        return failedFromResult(username, resolved);
      }
      target = {
        userId: resolved.identity.id,
        username,
        displayName: resolved.identity.displayName ?? account.display_name,
      };
      await this.sleep(this.pacing.settleDelayMs);
    }

    const result = await this.underQuotaPolicy(username, stats, () =>
      this.provider.fetchPostsSince(target, since, this.pacing.pageSize),
    );
    if (result.kind !== 'ok') {
      return failedFromResult(username, result);
    }

    this.logger.debug(
      { username, since: since.toISOString(), count: result.posts.length },
      'Fetched posts',
    );
    return { status: 'ok', username, posts: result.posts };
  }

  /**
   * Fetch every account in the given order with two-tier pacing. One
   * account's failure never stops the batch; only errors that are not
   * provider errors escape.
   */
  async fetchAll(
    accounts: Account[],
    sinceMap: Map<string, Date>,
    stats: RunStats,
    opts: { signal?: AbortSignal; fallbackSince?: Date } = {},
  ): Promise<BatchFetchResult> {
    const outcomes: AccountFetchOutcome[] = [];
    const posts: Post[] = [];
    let aborted = false;

    for (let i = 0; i < accounts.length; i++) {
      const account = accounts[i];
      if (!account) continue;

      if (opts.signal?.aborted) {
        aborted = true;
        this.logger.warn(
          { remaining: accounts.length - i },
          'Fetch batch aborted before next account',
        );
        break;
      }

      if (i > 0) {
        await this.sleep(this.pacing.requestDelayMs);
        if (i % this.pacing.batchSize === 0) {
          this.logger.info(
            { processed: i, total: accounts.length, delayMs: this.pacing.batchDelayMs },
            'Batch complete, cooling down',
          );
          await this.sleep(this.pacing.batchDelayMs);
        }
      }

      const since = sinceMap.get(account.username) ?? opts.fallbackSince ?? new Date();
      stats.accountsAttempted++;

      let outcome: AccountFetchOutcome;
      try {
        outcome = await this.fetchAccount(account, since, stats);
      } catch (err) {
        if (!(err instanceof ProviderError)) throw err;
        outcome = { status: 'failed', username: account.username, reason: 'error', message: err.message };
      }

      if (outcome.status === 'ok') {
        stats.accountsSucceeded++;
        stats.postsFetched += outcome.posts.length;
        posts.push(...outcome.posts);
      } else {
        recordFailure(stats, {
          username: outcome.username,
          reason: outcome.reason,
          message: outcome.message,
        });
        this.logger.warn(
          { username: outcome.username, reason: outcome.reason, error: outcome.message },
          'Account skipped this cycle',
        );
      }
      outcomes.push(outcome);
    }

    posts.sort(compareNewestFirst);
    return { posts, outcomes, aborted };
  }

  private async underQuotaPolicy<T extends { kind: string }>(
    username: string,
    stats: RunStats,
    call: () => Promise<QuotaLimited<T>>,
  ): Promise<QuotaLimited<T>> {
    let attempt = 0;
    while (true) {
      stats.requests++;
      const result = await call();
      if (!isQuotaExceeded(result)) return result;

      attempt++;
      stats.quotaHits++;
      const decision = this.policy.onQuotaExceeded({
        username,
        attempt,
        retryAfterMs: result.retryAfterMs,
      });
      if (decision.action === 'skip') {
        this.logger.warn({ username, attempt, policy: this.policy.name }, 'Quota exceeded, skipping');
        return result;
      }

      stats.retries++;
      this.logger.warn(
        { username, attempt, delayMs: decision.delayMs, policy: this.policy.name },
        'Quota exceeded, backing off',
      );
      await this.sleep(decision.delayMs);
    }
  }
}

function isQuotaExceeded(result: { kind: string }): result is { kind: 'quota_exceeded'; retryAfterMs?: number } {
  return result.kind === 'quota_exceeded';
}

function failedFromResult(
  username: string,
  result: { kind: 'not_found' } | { kind: 'quota_exceeded' } | { kind: 'server_error'; status: number },
): AccountFetchOutcome {
  switch (result.kind) {
    case 'not_found':
      return { status: 'failed', username, reason: 'not_found', message: `@${username} not found upstream` };
    case 'quota_exceeded':
      return { status: 'failed', username, reason: 'quota_exceeded', message: 'Quota exceeded' };
    case 'server_error':
      return {
        status: 'failed',
        username,
        reason: 'server_error',
        message: `Upstream server error (status ${result.status})`,
      };
  }
}
