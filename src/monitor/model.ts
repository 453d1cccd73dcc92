/**
 * Database row shape for the accounts table.
 */
export interface Account {
  username: string;
  user_id: string | null;
  display_name: string | null;
  description: string | null;
  added_at: string;
  consecutive_failures: number;
  last_failure_at: string | null;
}

/**
 * What a provider knows about an account after resolving its handle.
 */
export interface AccountIdentity {
  id: string;
  username: string;
  displayName: string | null;
  description: string | null;
}

export type PostKind = 'original' | 'repost' | 'reply';

/**
 * A fetched post. `created_at` is the post's own time (UTC ISO string),
 * never the time it was fetched.
 */
export interface Post {
  id: string;
  author_username: string;
  author_display_name: string | null;
  content: string;
  created_at: string;
  likes: number;
  reposts: number;
  replies: number;
  quotes: number;
  views: number | null;
  is_repost: boolean;
  is_reply: boolean;
  media_urls: string[];
  url: string;
}

/**
 * Database row shape for the posts table.
 */
export interface PostRow {
  id: string;
  author_username: string;
  author_display_name: string | null;
  content: string;
  created_at: string;
  likes: number;
  reposts: number;
  replies: number;
  quotes: number;
  views: number | null;
  is_repost: number;
  is_reply: number;
  media_urls: string;
  url: string;
  fetched_at: string;
}

export function postKind(post: Pick<Post, 'is_repost' | 'is_reply'>): PostKind {
  if (post.is_repost) return 'repost';
  if (post.is_reply) return 'reply';
  return 'original';
}

export function engagementScore(post: Pick<Post, 'likes' | 'reposts' | 'replies'>): number {
  return post.likes + post.reposts * 2 + post.replies * 3;
}

/** Newest first; ties broken by id so the order is total. */
export function compareNewestFirst(a: Post, b: Post): number {
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}
