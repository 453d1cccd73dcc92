import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../db/db.js';
import { Monitor } from '../monitor.js';
import { SkipPolicy } from '../quotaPolicy.js';
import { getAccount } from '../accountDb.js';
import { countPosts } from '../postDb.js';
import type { IngestState } from '../ingest.js';
import { ProviderError, ValidationError } from '../../shared/errors.js';
import { FakeProvider, NO_PACING, createTestDb, makePost, recordingSleep } from './helpers.js';

const CYCLE_STATES: IngestState[] = [
  'resolving_identities',
  'computing_watermarks',
  'fetching',
  'persisting',
  'reading_window',
  'done',
];

let db: Db;
let provider: FakeProvider;
let monitor: Monitor;
let clock: Date;

beforeEach(() => {
  db = createTestDb();
  provider = new FakeProvider();
  clock = new Date('2025-03-02T08:00:00.000Z');
  monitor = new Monitor({
    db,
    provider,
    policy: new SkipPolicy(),
    pacing: NO_PACING,
    settings: { bootstrapHours: 24, windowHours: 24, starvationThreshold: 3 },
    sleep: recordingSleep().sleep,
    now: () => clock,
  });
});

afterEach(() => {
  db.close();
});

describe('Monitor.registerAccount', () => {
  it('resolves and caches the id once, however often it is called', async () => {
    provider.addAccount('alice', 'A1');

    const first = await monitor.registerAccount('@Alice');
    const second = await monitor.registerAccount('alice');

    expect(first.user_id).toBe('A1');
    expect(first.display_name).toBe('ALICE');
    expect(second.user_id).toBe('A1');
    expect(provider.resolveCalls).toEqual(['alice']);
    expect(monitor.listAccounts()).toHaveLength(1);
  });

  it('registers the handle even when the lookup fails', async () => {
    provider.queueResolve('bob', { kind: 'server_error', status: 503 });
    const account = await monitor.registerAccount('bob');
    expect(account.username).toBe('bob');
    expect(account.user_id).toBeNull();
  });

  it('rejects an invalid handle without calling the provider', async () => {
    await expect(monitor.registerAccount('not a handle')).rejects.toThrow(ValidationError);
    expect(provider.resolveCalls).toEqual([]);
  });

  it('unregisters and keeps stored posts', async () => {
    provider.addAccount('alice', 'A1', [makePost({ id: '1', author_username: 'alice', created_at: '2025-03-02T07:00:00.000Z' })]);
    await monitor.registerAccount('alice');
    await monitor.runIngestionCycle();

    expect(monitor.unregisterAccount('@alice')).toBe(true);
    expect(monitor.unregisterAccount('alice')).toBe(false);
    expect(countPosts(db)).toBe(1);
  });
});

describe('Monitor.runIngestionCycle', () => {
  beforeEach(async () => {
    provider.addAccount('alice', 'A1', [
      makePost({ id: '100', author_username: 'alice', created_at: '2025-02-28T12:00:00.000Z' }),
      makePost({ id: '101', author_username: 'alice', created_at: '2025-03-01T10:00:00.000Z' }),
      makePost({ id: '102', author_username: 'alice', created_at: '2025-03-02T07:00:00.000Z' }),
    ]);
    await monitor.registerAccount('alice');
  });

  it('bootstraps a new account from now minus the lookback', async () => {
    const result = await monitor.runIngestionCycle();

    expect(provider.fetchCalls.map((c) => c.since.toISOString())).toEqual(['2025-03-01T08:00:00.000Z']);
    expect(result.stats.postsFetched).toBe(2);
    expect(result.stats.postsNew).toBe(2);
    expect(result.posts.map((p) => p.id)).toEqual(['102', '101']);
    expect(result.aborted).toBe(false);
  });

  it('continues from the newest stored post and stores overlaps once', async () => {
    await monitor.runIngestionCycle();
    const second = await monitor.runIngestionCycle();

    expect(provider.fetchCalls[1]?.since.toISOString()).toBe('2025-03-02T07:00:00.000Z');
    expect(second.stats.postsFetched).toBe(1);
    expect(second.stats.postsNew).toBe(0);
    expect(second.stats.postsDuplicate).toBe(1);
    expect(second.posts.map((p) => p.id)).toEqual(['102', '101']);
    expect(countPosts(db)).toBe(2);
  });

  it('never resolves a cached id again across cycles', async () => {
    for (let i = 0; i < 3; i++) await monitor.runIngestionCycle();
    expect(provider.resolveCalls).toEqual(['alice']);
    expect(provider.fetchCalls.every((c) => c.userId === 'A1')).toBe(true);
  });

  it('picks up posts made after the last cycle', async () => {
    await monitor.runIngestionCycle();
    provider.timelines.get('alice')?.push(
      makePost({ id: '103', author_username: 'alice', created_at: '2025-03-02T07:30:00.000Z' }),
    );
    clock = new Date('2025-03-02T09:00:00.000Z');

    const result = await monitor.runIngestionCycle();
    expect(result.stats.postsNew).toBe(1);
    expect(result.posts.map((p) => p.id)).toEqual(['103', '102', '101']);
  });

  it('reads the window from the store, not from the fetch', async () => {
    await monitor.runIngestionCycle();
    provider.queueFetch('alice', { kind: 'server_error', status: 500 });

    const result = await monitor.runIngestionCycle();
    expect(result.stats.accountsFailed).toBe(1);
    expect(result.posts.map((p) => p.id)).toEqual(['102', '101']);
  });

  it('steps through every state in order', async () => {
    const states: IngestState[] = [];
    await monitor.runIngestionCycle({ onStateChange: (s) => states.push(s) });
    expect(states).toEqual(CYCLE_STATES);
  });

  it('runs overlapping calls one after the other', async () => {
    const states: string[] = [];
    const [a, b] = await Promise.all([
      monitor.runIngestionCycle({ onStateChange: (s) => states.push(`a:${s}`) }),
      monitor.runIngestionCycle({ onStateChange: (s) => states.push(`b:${s}`) }),
    ]);

    expect(states).toEqual([...CYCLE_STATES.map((s) => `a:${s}`), ...CYCLE_STATES.map((s) => `b:${s}`)]);
    expect(a.stats.postsNew).toBe(2);
    expect(b.stats.postsNew).toBe(0);
  });

  it('returns what the store holds when aborted before fetching', async () => {
    await monitor.runIngestionCycle();
    const controller = new AbortController();
    controller.abort();

    const result = await monitor.runIngestionCycle({ signal: controller.signal });
    expect(result.aborted).toBe(true);
    expect(provider.fetchCalls).toHaveLength(1);
    expect(result.posts.map((p) => p.id)).toEqual(['102', '101']);
  });

  it('holds a registration until the running cycle is done', async () => {
    const events: string[] = [];
    await Promise.all([
      monitor.runIngestionCycle({ onStateChange: (s) => events.push(s) }),
      monitor.registerAccount('bob').then(() => events.push('registered')),
    ]);

    expect(events).toEqual([...CYCLE_STATES, 'registered']);
    expect(provider.resolveCalls).toEqual(['alice', 'bob']);
    expect(provider.fetchCalls.map((c) => c.username)).toEqual(['alice']);
  });

  it('propagates unexpected errors and still accepts the next run', async () => {
    provider.queueFetch('alice', new TypeError('boom'));
    await expect(monitor.runIngestionCycle()).rejects.toThrow(TypeError);

    const next = await monitor.runIngestionCycle();
    expect(next.stats.postsNew).toBe(2);
    expect(monitor.lastRunResult?.runId).toBe(next.runId);
  });
});

describe('unresolved and starving accounts', () => {
  it('skips unresolved accounts and retries resolution next cycle', async () => {
    await monitor.registerAccount('ghost');
    const result = await monitor.runIngestionCycle();

    expect(provider.resolveCalls).toEqual(['ghost', 'ghost']);
    expect(provider.fetchCalls).toEqual([]);
    expect(result.stats.accountsSkippedUnresolved).toBe(1);
    expect(result.stats.accountsAttempted).toBe(1);
    expect(result.stats.accountsFailed).toBe(1);
    expect(result.stats.failures).toEqual([
      { username: 'ghost', reason: 'unresolved', message: 'Upstream id not resolved yet' },
    ]);
    expect(getAccount(db, 'ghost')?.consecutive_failures).toBe(1);
  });

  it('keeps fetching other accounts when a lookup throws a provider error', async () => {
    provider.addAccount('alice', 'A1', [makePost({ id: '5', author_username: 'alice', created_at: '2025-03-02T06:00:00.000Z' })]);
    await monitor.registerAccount('alice');
    await monitor.registerAccount('bob');
    provider.queueResolve('bob', new ProviderError('Unreadable user lookup response'));

    const result = await monitor.runIngestionCycle();

    expect(provider.fetchCalls.map((c) => c.username)).toEqual(['alice']);
    expect(result.posts.map((p) => p.id)).toEqual(['5']);
    expect(result.stats.accountsSucceeded).toBe(1);
    expect(result.stats.accountsSkippedUnresolved).toBe(1);
    expect(result.stats.failures).toEqual([
      { username: 'bob', reason: 'error', message: 'Unreadable user lookup response' },
    ]);
    expect(getAccount(db, 'bob')?.user_id).toBeNull();
    expect(getAccount(db, 'bob')?.consecutive_failures).toBe(1);
  });

  it('still propagates a lookup error that is not a provider error', async () => {
    await monitor.registerAccount('bob');
    provider.queueResolve('bob', new TypeError('boom'));
    await expect(monitor.runIngestionCycle()).rejects.toThrow(TypeError);
  });

  it('resolves a late identity during the cycle and fetches it', async () => {
    provider.queueResolve('carol', { kind: 'server_error', status: 503 });
    provider.addAccount('carol', 'C1', [makePost({ id: '7', author_username: 'carol', created_at: '2025-03-02T06:00:00.000Z' })]);
    await monitor.registerAccount('carol');

    const result = await monitor.runIngestionCycle();
    expect(result.stats.identitiesResolved).toBe(1);
    expect(getAccount(db, 'carol')?.user_id).toBe('C1');
    expect(result.posts.map((p) => p.id)).toEqual(['7']);
  });

  it('reports an account once its failure streak reaches the threshold', async () => {
    await monitor.registerAccount('ghost');

    const first = await monitor.runIngestionCycle();
    const second = await monitor.runIngestionCycle();
    const third = await monitor.runIngestionCycle();

    expect(first.stats.starved).toEqual([]);
    expect(second.stats.starved).toEqual([]);
    expect(third.stats.starved).toEqual(['ghost']);
  });

  it('clears the streak after a successful cycle', async () => {
    provider.addAccount('bob', 'B1');
    await monitor.registerAccount('bob');
    provider.queueFetch('bob', { kind: 'server_error', status: 502 });

    await monitor.runIngestionCycle();
    expect(getAccount(db, 'bob')?.consecutive_failures).toBe(1);

    await monitor.runIngestionCycle();
    expect(getAccount(db, 'bob')?.consecutive_failures).toBe(0);
  });
});

describe('quota exhaustion in the middle of a batch', () => {
  it('skips only the exhausted account and persists the others', async () => {
    for (const [username, id, postId] of [
      ['alice', 'A1', '11'],
      ['bob', 'B1', '12'],
      ['carol', 'C1', '13'],
    ] as const) {
      provider.addAccount(username, id, [
        makePost({ id: postId, author_username: username, created_at: '2025-03-02T07:00:00.000Z' }),
      ]);
      await monitor.registerAccount(username);
    }
    provider.queueFetch('bob', { kind: 'quota_exceeded' });

    const result = await monitor.runIngestionCycle();

    expect(provider.fetchCalls.map((c) => c.username)).toEqual(['alice', 'bob', 'carol']);
    expect(result.stats.accountsSucceeded).toBe(2);
    expect(result.stats.accountsFailed).toBe(1);
    expect(result.stats.failures).toEqual([
      { username: 'bob', reason: 'quota_exceeded', message: 'Quota exceeded' },
    ]);
    expect(result.posts.map((p) => p.id)).toEqual(['13', '11']);
    expect(countPosts(db)).toBe(2);
  });
});

describe('settle delay after identity resolution', () => {
  it('pauses once between the last lookup and the first fetch', async () => {
    const { sleep, calls: sleeps } = recordingSleep();
    const paced = new Monitor({
      db,
      provider,
      policy: new SkipPolicy(),
      pacing: { requestDelayMs: 100, batchSize: 10, batchDelayMs: 1000, settleDelayMs: 50, pageSize: 100 },
      settings: { bootstrapHours: 24, windowHours: 24, starvationThreshold: 3 },
      sleep,
      now: () => clock,
    });
    provider.addAccount('alice', 'A1');
    provider.addAccount('carol', 'C1');
    await paced.registerAccount('alice');
    provider.queueResolve('carol', { kind: 'server_error', status: 503 });
    await paced.registerAccount('carol');

    await paced.runIngestionCycle();
    expect(sleeps).toEqual([50, 100]);

    sleeps.splice(0);
    await paced.runIngestionCycle();
    expect(sleeps).toEqual([100]);
  });
});

describe('Monitor.queryPosts', () => {
  it('normalizes handles and never calls the provider', async () => {
    provider.addAccount('alice', 'A1', [makePost({ id: '1', author_username: 'alice', created_at: '2025-03-02T07:00:00.000Z' })]);
    provider.addAccount('bob', 'B1', [makePost({ id: '2', author_username: 'bob', created_at: '2025-03-02T07:00:00.000Z' })]);
    await monitor.registerAccount('alice');
    await monitor.registerAccount('bob');
    await monitor.runIngestionCycle();
    const calls = provider.fetchCalls.length;

    const posts = monitor.queryPosts(new Date('2025-03-01T00:00:00.000Z'), ['@Alice']);
    expect(posts.map((p) => p.id)).toEqual(['1']);
    expect(monitor.recentPosts().map((p) => p.id)).toEqual(['2', '1']);
    expect(provider.fetchCalls).toHaveLength(calls);
  });
});
