import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { getRecentSummaries, getSummary } from '../../report/summaryDb.js';
import { regenerateReport } from '../../report/dailyReport.js';
import { ValidationError } from '../../shared/errors.js';

const RegenerateBody = z.object({
  date: z.string().optional(),
  notify: z.boolean().default(false),
});

export function summaryRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/summaries?days=7
  app.get('/summaries', (c) => {
    const days = Number(c.req.query('days') ?? 7);
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError('"days" must be a positive integer');
    }
    return c.json(getRecentSummaries(ctx.db, days));
  });

  // GET /api/summaries/:date
  app.get('/summaries/:date', (c) => {
    const date = c.req.param('date');
    const summary = getSummary(ctx.db, date);
    if (!summary) {
      return c.json({ error: `No summary for ${date}` }, 404);
    }
    return c.json(summary);
  });

  // POST /api/summaries/regenerate — rebuild from stored posts, no upstream calls
  app.post('/summaries/regenerate', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const parsed = RegenerateBody.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('Body must be {"date"?: "YYYY-MM-DD", "notify"?: boolean}', {
        errors: parsed.error.flatten().fieldErrors,
      });
    }

    const result = await regenerateReport(ctx.reports, parsed.data);
    if (!result) {
      return c.json({ error: 'No stored posts for that period' }, 404);
    }
    return c.json({ summary: result.summary, report_path: result.reportPath, delivered: result.delivered });
  });

  return app;
}
