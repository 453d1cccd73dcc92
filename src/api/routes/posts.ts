import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { hoursBefore } from '../../shared/utils.js';
import { ValidationError } from '../../shared/errors.js';

function parseTime(name: string, value: string | undefined): Date | undefined {
  if (value === undefined || value === '') return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid "${name}" timestamp: ${value}`);
  }
  return date;
}

export function postRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/posts?since=&until=&accounts=a,b — stored posts, newest first
  app.get('/posts', (c) => {
    const since =
      parseTime('since', c.req.query('since')) ??
      hoursBefore(new Date(), ctx.config.pacing.window_hours);
    const until = parseTime('until', c.req.query('until'));
    const accountsParam = c.req.query('accounts');
    const usernames = accountsParam
      ? accountsParam.split(',').map((s) => s.trim()).filter(Boolean)
      : undefined;

    const posts = ctx.monitor.queryPosts(since, usernames, until);
    return c.json({ since: since.toISOString(), until: until?.toISOString() ?? null, count: posts.length, posts });
  });

  return app;
}
