import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type { Post } from './model.js';
import type {
  FetchPostsResult,
  FetchTarget,
  PostProvider,
  ResolveResult,
  ServerFailure,
  QuotaExceeded,
} from './provider.js';
import { ConfigError, ProviderError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// ============================================================
// X API v2 payloads (partial). Everything optional that the API
// may omit; mapped to Post right here so nothing downstream sees them.
// ============================================================

const XErrorSchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional(),
  type: z.string().optional(),
});

const XUserResponseSchema = z.object({
  data: z
    .object({
      id: z.string(),
      username: z.string().optional(),
      name: z.string().optional(),
      description: z.string().optional(),
    })
    .optional(),
  errors: z.array(XErrorSchema).optional(),
});

const XMetricsSchema = z.object({
  like_count: z.number().optional(),
  retweet_count: z.number().optional(),
  reply_count: z.number().optional(),
  quote_count: z.number().optional(),
  impression_count: z.number().optional(),
});

const XTweetSchema = z.object({
  id: z.string(),
  text: z.string().default(''),
  created_at: z.string().optional(),
  public_metrics: XMetricsSchema.optional(),
  referenced_tweets: z.array(z.object({ type: z.string(), id: z.string().optional() })).optional(),
  attachments: z.object({ media_keys: z.array(z.string()).optional() }).optional(),
});

const XMediaSchema = z.object({
  media_key: z.string(),
  url: z.string().optional(),
  preview_image_url: z.string().optional(),
});

const XTimelineResponseSchema = z.object({
  data: z.array(XTweetSchema).optional(),
  includes: z.object({ media: z.array(XMediaSchema).optional() }).optional(),
  errors: z.array(XErrorSchema).optional(),
});

export type XTweet = z.infer<typeof XTweetSchema>;
export type XMedia = z.infer<typeof XMediaSchema>;

const TWEET_FIELDS = 'created_at,public_metrics,referenced_tweets,attachments';
const USER_FIELDS = 'id,name,description,created_at';

/** `2025-03-01T08:00:00.000Z` → `2025-03-01T08:00:00Z` (X rejects fractional seconds). */
export function formatStartTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function clampPageSize(pageSize: number): number {
  return Math.min(100, Math.max(5, Math.floor(pageSize)));
}

function parseCreatedAt(raw: string | undefined, now: Date): string {
  if (raw) {
    const parsed = new Date(raw);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  return now.toISOString();
}

/**
 * Map one X tweet to a Post. Unknown or malformed timestamps fall back to
 * `now` instead of dropping the post.
 */
export function mapTweet(
  tweet: XTweet,
  target: Pick<FetchTarget, 'username' | 'displayName'>,
  mediaByKey: Map<string, string>,
  now: Date = new Date(),
): Post {
  const refs = tweet.referenced_tweets ?? [];
  const metrics = tweet.public_metrics ?? {};

  const mediaUrls: string[] = [];
  for (const key of tweet.attachments?.media_keys ?? []) {
    const url = mediaByKey.get(key);
    if (url) mediaUrls.push(url);
  }

  return {
    id: tweet.id,
    author_username: target.username,
    author_display_name: target.displayName,
    content: tweet.text,
    created_at: parseCreatedAt(tweet.created_at, now),
    likes: metrics.like_count ?? 0,
    reposts: metrics.retweet_count ?? 0,
    replies: metrics.reply_count ?? 0,
    quotes: metrics.quote_count ?? 0,
    views: metrics.impression_count ?? null,
    is_repost: refs.some((r) => r.type === 'retweeted'),
    is_reply: refs.some((r) => r.type === 'replied_to'),
    media_urls: mediaUrls,
    url: `https://x.com/${target.username}/status/${tweet.id}`,
  };
}

export function buildMediaMap(media: XMedia[] | undefined): Map<string, string> {
  const map = new Map<string, string>();
  for (const m of media ?? []) {
    const url = m.url ?? m.preview_image_url;
    if (url) map.set(m.media_key, url);
  }
  return map;
}

type HttpOutcome = { kind: 'body'; status: number; body: unknown } | QuotaExceeded | ServerFailure;

export class XApiClient implements PostProvider {
  readonly name = 'x';
  private readonly baseUrl: string;
  private readonly bearerToken: string;
  private readonly timeoutMs: number;

  constructor(config: Config['x']) {
    this.baseUrl = config.base_url.replace(/\/+$/, '');
    this.bearerToken = config.bearer_token;
    this.timeoutMs = config.timeout_ms;
  }

  isConfigured(): boolean {
    return this.bearerToken.length > 0;
  }

  async resolveIdentity(username: string): Promise<ResolveResult> {
    const outcome = await this.get(
      `/users/by/username/${encodeURIComponent(username)}?user.fields=${USER_FIELDS}`,
    );
    if (outcome.kind !== 'body') return outcome;
    if (outcome.status === 404) return { kind: 'not_found' };

    const parsed = XUserResponseSchema.safeParse(outcome.body);
    if (!parsed.success) {
      throw new ProviderError('Unreadable user lookup response', {
        username,
        issues: parsed.error.issues.slice(0, 3),
      });
    }

    const data = parsed.data.data;
    if (!data) {
      // X answers 200 with an errors[] entry for unknown or suspended users
      return { kind: 'not_found' };
    }

    return {
      kind: 'ok',
      identity: {
        id: data.id,
        username,
        displayName: data.name ?? null,
        description: data.description ?? null,
      },
    };
  }

  async fetchPostsSince(
    target: FetchTarget,
    since: Date,
    pageSize: number,
  ): Promise<FetchPostsResult> {
    const params = new URLSearchParams({
      start_time: formatStartTime(since),
      max_results: String(clampPageSize(pageSize)),
      'tweet.fields': TWEET_FIELDS,
      expansions: 'attachments.media_keys',
      'media.fields': 'url,preview_image_url',
    });

    const outcome = await this.get(
      `/users/${encodeURIComponent(target.userId)}/tweets?${params.toString()}`,
    );
    if (outcome.kind !== 'body') return outcome;
    if (outcome.status === 404) {
      throw new ProviderError(`Timeline not found for @${target.username}`, {
        userId: target.userId,
      });
    }

    const parsed = XTimelineResponseSchema.safeParse(outcome.body);
    if (!parsed.success) {
      throw new ProviderError('Unreadable timeline response', {
        username: target.username,
        issues: parsed.error.issues.slice(0, 3),
      });
    }

    const mediaByKey = buildMediaMap(parsed.data.includes?.media);
    const now = new Date();
    const posts = (parsed.data.data ?? []).map((t) => mapTweet(t, target, mediaByKey, now));

    logger.debug({ username: target.username, count: posts.length }, 'X timeline fetched');
    return { kind: 'ok', posts };
  }

  private async get(pathAndQuery: string): Promise<HttpOutcome> {
    if (!this.isConfigured()) {
      throw new ConfigError('X bearer token is not configured (x.bearer_token)');
    }

    const url = `${this.baseUrl}${pathAndQuery}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Authorization: `Bearer ${this.bearerToken}` },
        signal: controller.signal,
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'AbortError';
      logger.warn(
        { url, error: err instanceof Error ? err.message : String(err), timedOut },
        'X request failed without response',
      );
      return { kind: 'server_error', status: 0 };
    } finally {
      clearTimeout(timer);
    }

    if (response.status === 429) {
      return { kind: 'quota_exceeded', retryAfterMs: retryAfterFromHeaders(response.headers) };
    }
    if (response.status >= 500) {
      return { kind: 'server_error', status: response.status };
    }
    if (response.status === 404) {
      return { kind: 'body', status: 404, body: null };
    }
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ProviderError(`X API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    try {
      const body: unknown = await response.json();
      return { kind: 'body', status: response.status, body };
    } catch {
      throw new ProviderError('X API response is not valid JSON', { url });
    }
  }
}

/**
 * `x-rate-limit-reset` is the epoch second at which the window reopens.
 */
export function retryAfterFromHeaders(headers: Headers, now: number = Date.now()): number | undefined {
  const reset = headers.get('x-rate-limit-reset');
  if (!reset) return undefined;
  const resetSec = Number(reset);
  if (!Number.isFinite(resetSec)) return undefined;
  return Math.max(0, resetSec * 1000 - now);
}
