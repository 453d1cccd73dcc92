import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import type { Post } from '../monitor/model.js';
import type { ChatClient } from '../llm/client.js';
import type { Notifier } from '../push/notifier.js';
import type { IngestRunResult } from '../monitor/ingest.js';
import { Monitor, createMonitor } from '../monitor/monitor.js';
import { listStarvedAccounts } from '../monitor/accountDb.js';
import { LlmClient } from '../llm/client.js';
import { createNotifiers } from '../push/notifier.js';
import { analyzePosts } from './analyze.js';
import { saveSummary, type DailySummary } from './summaryDb.js';
import { selectTopPosts, writeReportFile, type ReportContent } from './markdown.js';
import { HOUR_MS, dayKey, parseDayKey } from '../shared/utils.js';
import { PostwatchError, ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ReportDeps {
  db: Db;
  monitor: Monitor;
  llm: ChatClient;
  notifiers: Notifier[];
  report: Config['report'];
  starvationThreshold: number;
  now?: () => Date;
}

export interface ReportResult {
  summary: DailySummary;
  reportPath: string;
  /** Names of the notifiers that delivered successfully. */
  delivered: string[];
}

export interface DailyReportResult extends ReportResult {
  ingest: IngestRunResult;
}

export function createReportDeps(db: Db, config: Config): ReportDeps {
  return {
    db,
    monitor: createMonitor(db, config),
    llm: new LlmClient(config.llm),
    notifiers: createNotifiers(config.delivery),
    report: config.report,
    starvationThreshold: config.quota.starvation_threshold,
  };
}

/**
 * Send through every notifier. A failing channel is logged and does not stop
 * the others.
 */
export async function deliverReport(notifiers: Notifier[], content: ReportContent): Promise<string[]> {
  const delivered: string[] = [];
  for (const notifier of notifiers) {
    try {
      await notifier.send(content);
      delivered.push(notifier.name);
    } catch (err) {
      if (!(err instanceof PostwatchError)) throw err;
      logger.error({ notifier: notifier.name, error: err.message }, 'Report delivery failed');
    }
  }
  return delivered;
}

async function buildReport(
  deps: ReportDeps,
  date: string,
  posts: Post[],
  starved: string[],
  notify: boolean,
): Promise<ReportResult> {
  const draft = await analyzePosts(deps.llm, {
    date,
    posts,
    accountsMonitored: deps.monitor.listAccounts().length,
    maxPostsPerAccount: deps.report.max_posts_per_account,
  });
  const summary = saveSummary(deps.db, draft);
  const content: ReportContent = { summary, topPosts: selectTopPosts(posts), starved };
  const reportPath = writeReportFile(deps.report.output_dir, content);
  const delivered = notify ? await deliverReport(deps.notifiers, content) : [];
  return { summary, reportPath, delivered };
}

/**
 * The scheduled job: ingest, summarize the trailing window, save, write the
 * markdown report and deliver it.
 */
export async function runDailyReport(deps: ReportDeps): Promise<DailyReportResult> {
  const now = deps.now ?? (() => new Date());
  logger.info('Daily report starting');

  const ingest = await deps.monitor.runIngestionCycle();
  const date = dayKey(now());
  const result = await buildReport(deps, date, ingest.posts, ingest.stats.starved, true);

  logger.info(
    { date, posts: ingest.posts.length, delivered: result.delivered, path: result.reportPath },
    'Daily report complete',
  );
  return { ...result, ingest };
}

/**
 * Rebuild a report from stored posts without calling the provider. Without a
 * date the trailing window ending now is used; with one, that UTC day.
 * Returns null when the period has no posts.
 */
export async function regenerateReport(
  deps: ReportDeps,
  opts: { date?: string; notify?: boolean } = {},
): Promise<ReportResult | null> {
  const now = deps.now ?? (() => new Date());

  let date: string;
  let posts: Post[];
  if (opts.date) {
    const start = parseDayKey(opts.date);
    if (!start) {
      throw new ValidationError(`Invalid date "${opts.date}", expected YYYY-MM-DD`);
    }
    date = opts.date;
    posts = deps.monitor.queryPosts(start, undefined, new Date(start.getTime() + 24 * HOUR_MS));
  } else {
    date = dayKey(now());
    posts = deps.monitor.recentPosts();
  }

  if (posts.length === 0) {
    logger.info({ date }, 'No stored posts for period, nothing to regenerate');
    return null;
  }

  const starved = listStarvedAccounts(deps.db, deps.starvationThreshold).map((a) => a.username);
  const result = await buildReport(deps, date, posts, starved, opts.notify ?? false);
  logger.info({ date, posts: posts.length, delivered: result.delivered }, 'Report regenerated');
  return result;
}
