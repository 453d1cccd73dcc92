import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { getPostCountsByAuthor } from '../../monitor/postDb.js';
import { ValidationError } from '../../shared/errors.js';

const AddAccountBody = z.object({ username: z.string().min(1) });

export function accountRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/accounts — monitored accounts with stored post counts
  app.get('/accounts', (c) => {
    const counts = getPostCountsByAuthor(ctx.db);
    const accounts = ctx.monitor.listAccounts().map((a) => ({
      ...a,
      post_count: counts.get(a.username) ?? 0,
    }));
    return c.json(accounts);
  });

  // POST /api/accounts — register a handle (idempotent)
  app.post('/accounts', async (c) => {
    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = AddAccountBody.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('Body must be {"username": string}', {
        errors: parsed.error.flatten().fieldErrors,
      });
    }
    const account = await ctx.monitor.registerAccount(parsed.data.username);
    return c.json(account);
  });

  // DELETE /api/accounts/:username — stop monitoring; stored posts stay
  app.delete('/accounts/:username', (c) => {
    const username = c.req.param('username');
    if (!ctx.monitor.unregisterAccount(username)) {
      return c.json({ error: `Account not monitored: ${username}` }, 404);
    }
    return c.json({ removed: true });
  });

  return app;
}
