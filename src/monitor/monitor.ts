import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import type { Account, Post } from './model.js';
import type { PostProvider } from './provider.js';
import type { QuotaPolicy } from './quotaPolicy.js';
import {
  addAccount,
  getAccount,
  listAccounts,
  normalizeUsername,
  removeAccount,
  updateAccountInfo,
} from './accountDb.js';
import { queryPosts } from './postDb.js';
import { PacedFetcher, pacingFromConfig, type PacingOptions } from './pacedFetcher.js';
import { createQuotaPolicy } from './quotaPolicy.js';
import { createRunStats } from './stats.js';
import {
  runIngestionCycle,
  type IngestRunOptions,
  type IngestRunResult,
  type IngestSettings,
} from './ingest.js';
import { XApiClient } from './xApi.js';
import { PostwatchError } from '../shared/errors.js';
import { hoursBefore } from '../shared/utils.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

export interface MonitorOptions {
  db: Db;
  provider: PostProvider;
  pacing: PacingOptions;
  policy: QuotaPolicy;
  settings: IngestSettings;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

// One in-flight run per database handle, shared across Monitor instances.
const runQueues = new WeakMap<Db, Promise<unknown>>();

/**
 * Entry point for consumers of the ingestion engine: account registration,
 * ingestion cycles and read-only window queries.
 */
export class Monitor {
  private readonly db: Db;
  private readonly fetcher: PacedFetcher;
  private readonly settings: IngestSettings;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private lastRun: IngestRunResult | null = null;

  constructor(opts: MonitorOptions) {
    this.db = opts.db;
    this.settings = opts.settings;
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? rootLogger;
    this.fetcher = new PacedFetcher({
      provider: opts.provider,
      policy: opts.policy,
      pacing: opts.pacing,
      sleep: opts.sleep,
      logger: this.logger,
      onIdentityResolved: (username, identity) => {
        updateAccountInfo(this.db, username, {
          user_id: identity.id,
          display_name: identity.displayName,
          description: identity.description,
        });
      },
    });
  }

  /**
   * Start monitoring a handle. Re-registering returns the stored record
   * without touching the provider. A failed lookup still registers the
   * handle; it is resolved on a later cycle. Registration waits for any
   * cycle in progress, so its lookup never lands inside a paced batch.
   */
  async registerAccount(rawUsername: string): Promise<Account> {
    const username = normalizeUsername(rawUsername);
    return this.enqueue(() => this.register(username));
  }

  unregisterAccount(rawUsername: string): boolean {
    const removed = removeAccount(this.db, normalizeUsername(rawUsername));
    if (removed) this.logger.info({ username: rawUsername }, 'Account removed');
    return removed;
  }

  listAccounts(): Account[] {
    return listAccounts(this.db);
  }

  /**
   * Run one ingestion cycle. Calls made while another cycle is running on
   * the same database wait for it, then run.
   */
  async runIngestionCycle(opts: IngestRunOptions = {}): Promise<IngestRunResult> {
    const result = await this.enqueue(() =>
      runIngestionCycle(
        { db: this.db, fetcher: this.fetcher, settings: this.settings, now: this.now, logger: this.logger },
        opts,
      ),
    );
    this.lastRun = result;
    return result;
  }

  private async register(username: string): Promise<Account> {
    const existing = getAccount(this.db, username);
    if (existing) {
      this.logger.info({ username }, 'Account already monitored');
      return existing;
    }

    const { account } = addAccount(this.db, { username });
    this.logger.info({ username }, 'Account added');

    try {
      const result = await this.fetcher.resolveAccount(username, createRunStats());
      if (result.kind !== 'ok') {
        this.logger.warn({ username, result: result.kind }, 'Identity lookup failed at registration');
      }
    } catch (err) {
      if (!(err instanceof PostwatchError)) throw err;
      this.logger.warn({ username, error: err.message }, 'Identity lookup failed at registration');
    }

    return getAccount(this.db, username) ?? account;
  }

  /** Chain a provider-touching task behind everything queued on this database. */
  private async enqueue<T>(task: () => Promise<T>): Promise<T> {
    const previous = runQueues.get(this.db) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(task);
    runQueues.set(this.db, next);

    try {
      return await next;
    } finally {
      if (runQueues.get(this.db) === next) runQueues.delete(this.db);
    }
  }

  get lastRunResult(): IngestRunResult | null {
    return this.lastRun;
  }

  /**
   * Stored posts with `since <= created_at < until`, newest first. Never
   * calls the provider.
   */
  queryPosts(since: Date, usernames?: string[], until?: Date): Post[] {
    return queryPosts(this.db, {
      since,
      until,
      usernames: usernames?.map(normalizeUsername),
    });
  }

  /** Trailing read window ending now. */
  recentPosts(usernames?: string[]): Post[] {
    return this.queryPosts(hoursBefore(this.now(), this.settings.windowHours), usernames);
  }
}

export function ingestSettingsFromConfig(config: Config): IngestSettings {
  return {
    bootstrapHours: config.pacing.bootstrap_hours,
    windowHours: config.pacing.window_hours,
    starvationThreshold: config.quota.starvation_threshold,
  };
}

export function createMonitor(db: Db, config: Config, provider?: PostProvider): Monitor {
  return new Monitor({
    db,
    provider: provider ?? new XApiClient(config.x),
    pacing: pacingFromConfig(config.pacing),
    policy: createQuotaPolicy(config.quota),
    settings: ingestSettingsFromConfig(config),
  });
}
