import { z } from 'zod';
import type { Db } from '../db/db.js';
import type { Post, PostRow } from './model.js';
import { nowISO, toStoredTime } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';

const MediaUrlsSchema = z.array(z.string());

function parseMediaUrls(raw: string): string[] {
  try {
    const parsed = MediaUrlsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

export function rowToPost(row: PostRow): Post {
  return {
    id: row.id,
    author_username: row.author_username,
    author_display_name: row.author_display_name,
    content: row.content,
    created_at: row.created_at,
    likes: row.likes,
    reposts: row.reposts,
    replies: row.replies,
    quotes: row.quotes,
    views: row.views,
    is_repost: row.is_repost === 1,
    is_reply: row.is_reply === 1,
    media_urls: parseMediaUrls(row.media_urls),
    url: row.url,
  };
}

/**
 * Insert posts in one transaction. A post whose id is already stored is
 * ignored, whatever its payload. Returns the number of rows actually inserted.
 */
export function insertPosts(db: Db, posts: Post[]): number {
  if (posts.length === 0) return 0;

  const stmt = db.prepare(
    `INSERT OR IGNORE INTO posts
     (id, author_username, author_display_name, content, created_at, likes, reposts, replies,
      quotes, views, is_repost, is_reply, media_urls, url, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  const insertAll = db.transaction((batch: Post[]) => {
    const fetchedAt = nowISO();
    let inserted = 0;
    for (const post of batch) {
      const result = stmt.run(
        post.id,
        post.author_username,
        post.author_display_name,
        post.content,
        toStoredTime(new Date(post.created_at)),
        post.likes,
        post.reposts,
        post.replies,
        post.quotes,
        post.views,
        post.is_repost ? 1 : 0,
        post.is_reply ? 1 : 0,
        JSON.stringify(post.media_urls),
        post.url,
        fetchedAt,
      );
      inserted += result.changes;
    }
    return inserted;
  });

  try {
    return insertAll(posts);
  } catch (err) {
    throw new DbError(`Failed to insert posts: ${err instanceof Error ? err.message : String(err)}`, {
      count: posts.length,
    });
  }
}

export interface PostQuery {
  since: Date;
  until?: Date;
  usernames?: string[];
}

/**
 * Posts with `since <= created_at < until`, newest first.
 */
export function queryPosts(db: Db, query: PostQuery): Post[] {
  const where = ['created_at >= ?'];
  const params: Array<string> = [toStoredTime(query.since)];

  if (query.until) {
    where.push('created_at < ?');
    params.push(toStoredTime(query.until));
  }
  if (query.usernames) {
    if (query.usernames.length === 0) return [];
    where.push(`author_username IN (${query.usernames.map(() => '?').join(', ')})`);
    params.push(...query.usernames);
  }

  const rows = db
    .prepare(`SELECT * FROM posts WHERE ${where.join(' AND ')} ORDER BY created_at DESC, id DESC`)
    .all(...params) as PostRow[];
  return rows.map(rowToPost);
}

export function getPost(db: Db, id: string): Post | undefined {
  const row = db.prepare('SELECT * FROM posts WHERE id = ?').get(id) as PostRow | undefined;
  return row ? rowToPost(row) : undefined;
}

export function getLastPostTime(db: Db, username: string): Date | null {
  const row = db
    .prepare('SELECT MAX(created_at) AS last FROM posts WHERE author_username = ?')
    .get(username) as { last: string | null } | undefined;
  return row?.last ? new Date(row.last) : null;
}

export function countPosts(db: Db): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM posts').get() as { count: number };
  return row.count;
}

export function getPostCountsByAuthor(db: Db): Map<string, number> {
  const rows = db
    .prepare('SELECT author_username, COUNT(*) AS count FROM posts GROUP BY author_username')
    .all() as Array<{ author_username: string; count: number }>;
  return new Map(rows.map((r) => [r.author_username, r.count]));
}
