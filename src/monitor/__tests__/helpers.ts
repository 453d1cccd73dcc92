import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import type { Db } from '../../db/db.js';
import type { Account, AccountIdentity, Post } from '../model.js';
import type { FetchPostsResult, FetchTarget, PostProvider, ResolveResult } from '../provider.js';
import type { PacingOptions } from '../pacedFetcher.js';

export function createTestDb(): Db {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

export function makePost(overrides: Partial<Post> = {}): Post {
  const id = overrides.id ?? '1000';
  const author = overrides.author_username ?? 'jack';
  return {
    id,
    author_username: author,
    author_display_name: null,
    content: `post ${id}`,
    created_at: '2025-03-01T12:00:00.000Z',
    likes: 0,
    reposts: 0,
    replies: 0,
    quotes: 0,
    views: null,
    is_repost: false,
    is_reply: false,
    media_urls: [],
    url: `https://x.com/${author}/status/${id}`,
    ...overrides,
  };
}

export const NO_PACING: PacingOptions = {
  requestDelayMs: 0,
  batchSize: 10,
  batchDelayMs: 0,
  settleDelayMs: 0,
  pageSize: 100,
};

/** Records every requested delay instead of waiting. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: (ms: number) => {
      calls.push(ms);
      return Promise.resolve();
    },
  };
}

/**
 * In-process provider. Timelines hold every post an account has ever made;
 * fetches return those at or after `since`. Queued results override the
 * timeline one call at a time.
 */
export class FakeProvider implements PostProvider {
  readonly name = 'fake';
  readonly identities = new Map<string, AccountIdentity>();
  readonly timelines = new Map<string, Post[]>();
  readonly queuedResolves = new Map<string, Array<ResolveResult | Error>>();
  readonly queuedFetches = new Map<string, Array<FetchPostsResult | Error>>();
  readonly resolveCalls: string[] = [];
  readonly fetchCalls: Array<{ username: string; userId: string; since: Date }> = [];

  addAccount(username: string, id: string, posts: Post[] = []): void {
    this.identities.set(username, { id, username, displayName: username.toUpperCase(), description: null });
    this.timelines.set(username, posts);
  }

  queueResolve(username: string, ...results: Array<ResolveResult | Error>): void {
    this.queuedResolves.set(username, [...(this.queuedResolves.get(username) ?? []), ...results]);
  }

  queueFetch(username: string, ...results: Array<FetchPostsResult | Error>): void {
    this.queuedFetches.set(username, [...(this.queuedFetches.get(username) ?? []), ...results]);
  }

  resolveIdentity(username: string): Promise<ResolveResult> {
    this.resolveCalls.push(username);
    const queued = this.queuedResolves.get(username)?.shift();
    if (queued instanceof Error) return Promise.reject(queued);
    if (queued) return Promise.resolve(queued);

    const identity = this.identities.get(username);
    return Promise.resolve(identity ? { kind: 'ok', identity } : { kind: 'not_found' });
  }

  fetchPostsSince(target: FetchTarget, since: Date): Promise<FetchPostsResult> {
    this.fetchCalls.push({ username: target.username, userId: target.userId, since });
    const queued = this.queuedFetches.get(target.username)?.shift();
    if (queued instanceof Error) return Promise.reject(queued);
    if (queued) return Promise.resolve(queued);

    const posts = (this.timelines.get(target.username) ?? []).filter(
      (p) => new Date(p.created_at).getTime() >= since.getTime(),
    );
    return Promise.resolve({ kind: 'ok', posts });
  }
}

export function makeAccount(username: string, userId: string | null = `id-${username}`): Account {
  return {
    username,
    user_id: userId,
    display_name: null,
    description: null,
    added_at: '2025-03-01T00:00:00.000Z',
    consecutive_failures: 0,
    last_failure_at: null,
  };
}
