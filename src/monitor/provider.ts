import type { AccountIdentity, Post } from './model.js';

export type QuotaExceeded = { kind: 'quota_exceeded'; retryAfterMs?: number };
export type ServerFailure = { kind: 'server_error'; status: number };

export type ResolveResult =
  | { kind: 'ok'; identity: AccountIdentity }
  | { kind: 'not_found' }
  | QuotaExceeded
  | ServerFailure;

export type FetchPostsResult = { kind: 'ok'; posts: Post[] } | QuotaExceeded | ServerFailure;

export interface FetchTarget {
  userId: string;
  username: string;
  displayName: string | null;
}

/**
 * Upstream post source. Expected operational outcomes come back as results;
 * anything else (unexpected status, unreadable payload) is thrown as a
 * ProviderError.
 */
export interface PostProvider {
  readonly name: string;
  resolveIdentity(username: string): Promise<ResolveResult>;
  fetchPostsSince(target: FetchTarget, since: Date, pageSize: number): Promise<FetchPostsResult>;
}
