import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import type { Monitor } from '../monitor/monitor.js';
import { PostwatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { resolvePath, getPostwatchDir } from '../shared/utils.js';
import { createReportDeps, type ReportDeps } from '../report/dailyReport.js';
import { accountRoutes } from './routes/accounts.js';
import { ingestRoutes } from './routes/ingest.js';
import { postRoutes } from './routes/posts.js';
import { summaryRoutes } from './routes/summaries.js';
import { systemRoutes } from './routes/system.js';
import { startScheduler, stopScheduler } from '../push/scheduler.js';

export interface AppContext {
  db: Db;
  config: Config;
  monitor: Monitor;
  reports: ReportDeps;
}

export function createAppContext(db: Db, config: Config): AppContext {
  const reports = createReportDeps(db, config);
  return { db, config, monitor: reports.monitor, reports };
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', accountRoutes(ctx));
  app.route('/api', ingestRoutes(ctx));
  app.route('/api', postRoutes(ctx));
  app.route('/api', summaryRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof PostwatchError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'VALIDATION_ERROR':
      return 400;
    case 'PROVIDER_ERROR':
    case 'LLM_ERROR':
    case 'NOTIFY_ERROR':
      return 502;
    default:
      return 500;
  }
}

/**
 * Write the default config on first run.
 */
function autoInit(): void {
  const configPath = path.join(getPostwatchDir(), 'config.yaml');
  if (!process.env['POSTWATCH_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: created default config');
  }
}

export async function startServer(opts: { port?: number; schedule?: boolean } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const ctx = createAppContext(db, config);
  const app = createApp(ctx);

  logger.info({ port, host }, 'Starting postwatch server');

  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  if (opts.schedule ?? true) {
    startScheduler(ctx.reports, config.schedule);
  }

  const shutdown = () => {
    logger.info('Shutting down...');
    stopScheduler();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
