import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import type { IngestRunResult } from '../../monitor/ingest.js';

function runSummary(result: IngestRunResult) {
  return {
    run_id: result.runId,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    duration_ms: result.durationMs,
    aborted: result.aborted,
    window_posts: result.posts.length,
    stats: result.stats,
  };
}

export function ingestRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/ingest — run one ingestion cycle; waits for any run in progress
  app.post('/ingest', async (c) => {
    const result = await ctx.monitor.runIngestionCycle();
    return c.json(runSummary(result));
  });

  // GET /api/ingest/status — last run stats
  app.get('/ingest/status', (c) => {
    const last = ctx.monitor.lastRunResult;
    if (!last) {
      return c.json({ message: 'No ingest has been run yet' }, 404);
    }
    return c.json(runSummary(last));
  });

  return app;
}
