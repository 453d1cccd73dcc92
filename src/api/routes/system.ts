import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { countPosts } from '../../monitor/postDb.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/doctor — what is configured, without secrets
  app.get('/doctor', (c) => {
    const checks: Record<string, string> = {};

    try {
      ctx.db.prepare('SELECT 1').get();
      checks['db'] = 'ok';
    } catch {
      checks['db'] = 'error';
    }

    checks['accounts'] = `${ctx.monitor.listAccounts().length} monitored`;
    checks['posts'] = `${countPosts(ctx.db)} stored`;
    checks['x_api'] = ctx.config.x.bearer_token ? 'configured' : 'unconfigured';
    checks['llm'] = ctx.config.llm.api_key ? 'configured' : 'unconfigured';
    checks['email'] = ctx.config.delivery.email.enabled ? 'enabled' : 'disabled';
    checks['telegram'] = ctx.config.delivery.telegram.enabled ? 'enabled' : 'disabled';

    return c.json(checks);
  });

  return app;
}
