import type { Db } from '../db/db.js';
import type { Account, Post } from './model.js';
import type { PacedFetcher, AccountFetchOutcome } from './pacedFetcher.js';
import { listAccounts, recordAccountFailure, clearAccountFailures } from './accountDb.js';
import { insertPosts, queryPosts } from './postDb.js';
import { buildSinceMap } from './watermark.js';
import { ensureIdentities } from './identity.js';
import { createRunStats, recordFailure, type RunStats } from './stats.js';
import { generateId, hoursBefore } from '../shared/utils.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

export type IngestState =
  | 'idle'
  | 'resolving_identities'
  | 'computing_watermarks'
  | 'fetching'
  | 'persisting'
  | 'reading_window'
  | 'done';

export interface IngestRunResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  /** Store-backed window read, newest first. Not the raw fetch delta. */
  posts: Post[];
  stats: RunStats;
  aborted: boolean;
}

export interface IngestSettings {
  bootstrapHours: number;
  windowHours: number;
  starvationThreshold: number;
}

export interface IngestDeps {
  db: Db;
  fetcher: PacedFetcher;
  settings: IngestSettings;
  now?: () => Date;
  logger?: Logger;
}

export interface IngestRunOptions {
  /** Checked before each account's fetch; in-flight calls finish. */
  signal?: AbortSignal;
  onStateChange?: (state: IngestState) => void;
}

/**
 * One ingestion cycle: idle → resolving_identities → computing_watermarks →
 * fetching → persisting → reading_window → done. Per-account failures only
 * show up in the stats; errors that are not provider errors end the run.
 */
export async function runIngestionCycle(
  deps: IngestDeps,
  opts: IngestRunOptions = {},
): Promise<IngestRunResult> {
  const { db, fetcher, settings } = deps;
  const now = deps.now ?? (() => new Date());
  const runId = generateId(10);
  const log = (deps.logger ?? rootLogger).child({ runId });
  const started = now();
  const stats = createRunStats();

  let state: IngestState = 'idle';
  const enter = (next: IngestState): void => {
    log.debug({ from: state, to: next }, 'Ingest state change');
    state = next;
    opts.onStateChange?.(next);
  };

  const accounts = listAccounts(db);
  stats.accountsTotal = accounts.length;
  log.info({ accounts: accounts.length }, 'Ingestion cycle starting');

  enter('resolving_identities');
  const identities = await ensureIdentities(fetcher, accounts, stats, log);
  const ready = identities.accounts.filter((a) => a.user_id);
  const unresolved = identities.accounts.filter((a) => !a.user_id);
  // Skipped accounts count as attempted: attempted = succeeded + failed.
  for (const account of unresolved) {
    stats.accountsAttempted++;
    stats.accountsSkippedUnresolved++;
    const lookupError = identities.lookupErrors.get(account.username);
    recordFailure(
      stats,
      lookupError === undefined
        ? { username: account.username, reason: 'unresolved', message: 'Upstream id not resolved yet' }
        : { username: account.username, reason: 'error', message: lookupError },
    );
  }

  enter('computing_watermarks');
  const sinceMap = buildSinceMap(db, ready, {
    now: started,
    bootstrapHours: settings.bootstrapHours,
  });

  enter('fetching');
  const batch = await fetcher.fetchAll(ready, sinceMap, stats, { signal: opts.signal });

  enter('persisting');
  const inserted = insertPosts(db, batch.posts);
  stats.postsNew = inserted;
  stats.postsDuplicate = batch.posts.length - inserted;
  updateFailureStreaks(db, batch.outcomes, unresolved, stats, settings.starvationThreshold, log);

  enter('reading_window');
  const posts = queryPosts(db, { since: hoursBefore(now(), settings.windowHours) });

  enter('done');
  const finished = now();
  const result: IngestRunResult = {
    runId,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
    posts,
    stats,
    aborted: batch.aborted,
  };

  log.info(
    {
      succeeded: stats.accountsSucceeded,
      failed: stats.accountsFailed,
      postsFetched: stats.postsFetched,
      postsNew: stats.postsNew,
      windowPosts: posts.length,
      aborted: batch.aborted,
      durationMs: result.durationMs,
    },
    'Ingestion cycle complete',
  );
  return result;
}

/**
 * Count consecutive failed cycles per account. Reaching the threshold is
 * reported, not fatal.
 */
function updateFailureStreaks(
  db: Db,
  outcomes: AccountFetchOutcome[],
  unresolved: Account[],
  stats: RunStats,
  threshold: number,
  log: Logger,
): void {
  const failed = [
    ...outcomes.filter((o) => o.status === 'failed').map((o) => o.username),
    ...unresolved.map((a) => a.username),
  ];

  for (const outcome of outcomes) {
    if (outcome.status === 'ok') clearAccountFailures(db, outcome.username);
  }

  for (const username of failed) {
    const streak = recordAccountFailure(db, username);
    if (streak >= threshold) {
      stats.starved.push(username);
      log.error(
        { username, consecutiveFailures: streak, threshold },
        'Account has failed repeatedly and is not being ingested',
      );
    }
  }
}
