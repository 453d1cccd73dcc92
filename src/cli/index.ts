#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getPostwatchDir, hoursBefore, resolvePath } from '../shared/utils.js';
import { PostwatchError, errorMessage } from '../shared/errors.js';
import { initDb, closeDb, type Db } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { createMonitor } from '../monitor/monitor.js';
import { getPostCountsByAuthor, countPosts } from '../monitor/postDb.js';
import { postKind, type Post } from '../monitor/model.js';
import type { IngestRunResult } from '../monitor/ingest.js';
import { getRecentSummaries } from '../report/summaryDb.js';
import { createReportDeps, regenerateReport, runDailyReport } from '../report/dailyReport.js';
import { verifySmtp } from '../push/email.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('postwatch')
  .description('Incremental X account monitor with daily LLM reports')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getPostwatchDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database, credentials and delivery channels')
  .action(async () => {
    const results: string[] = [];

    let config: Config;
    try {
      config = await loadConfig();
      results.push('Config: ok');
    } catch (err) {
      log(`✗ Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
      return;
    }

    const dbPath = resolvePath(config.db.path);
    if (!fs.existsSync(dbPath)) {
      results.push('DB: missing (run postwatch init)');
    } else {
      try {
        const db = initDb(dbPath);
        runMigrations(db);
        const accounts = createMonitor(db, config).listAccounts();
        results.push(`DB: ok (${accounts.length} accounts, ${countPosts(db)} posts)`);
      } catch (err) {
        results.push(`DB: error (${errorMessage(err)})`);
      } finally {
        closeDb();
      }
    }

    results.push(config.x.bearer_token ? 'X API: configured' : 'X API: (unconfigured)');
    results.push(config.llm.api_key ? 'LLM: configured' : 'LLM: (unconfigured)');

    if (config.delivery.email.enabled) {
      const ok = await verifySmtp(config.delivery.email);
      results.push(ok ? 'Email: ok' : 'Email: SMTP check failed');
    }
    if (config.delivery.telegram.enabled) {
      const tg = config.delivery.telegram;
      results.push(tg.bot_token && tg.chat_id ? 'Telegram: configured' : 'Telegram: missing bot_token/chat_id');
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === add ===
program
  .command('add <usernames...>')
  .description('Start monitoring one or more X accounts')
  .action(async (usernames: string[]) => {
    const { db, config, cleanup } = await getDb();
    try {
      const monitor = createMonitor(db, config);
      for (const username of usernames) {
        const account = await monitor.registerAccount(username);
        const resolved = account.user_id ? `id ${account.user_id}` : 'id unresolved, retried next run';
        log(`✓ @${account.username} (${resolved})`);
      }
    } finally {
      cleanup();
    }
  });

// === remove ===
program
  .command('remove <username>')
  .description('Stop monitoring an account (stored posts are kept)')
  .action(async (username: string) => {
    const { db, config, cleanup } = await getDb();
    try {
      if (createMonitor(db, config).unregisterAccount(username)) {
        log(`✓ @${username.replace(/^@/, '')} removed`);
      } else {
        log(`Account not monitored: ${username}`);
        process.exitCode = 1;
      }
    } finally {
      cleanup();
    }
  });

// === list ===
program
  .command('list')
  .description('List monitored accounts')
  .action(async () => {
    const { db, config, cleanup } = await getDb();
    try {
      const accounts = createMonitor(db, config).listAccounts();
      const counts = getPostCountsByAuthor(db);

      if (accounts.length === 0) {
        log('No accounts monitored. Use: postwatch add <username>');
        return;
      }
      for (const a of accounts) {
        const status = a.consecutive_failures > 0 ? `⚠ ${a.consecutive_failures} failed runs` : '';
        const name = `@${a.username}`.padEnd(18);
        const display = (a.display_name ?? '').padEnd(24);
        log(`${name} ${display} ${String(counts.get(a.username) ?? 0).padStart(5)} posts  ${status}`);
      }
      log(`\n${accounts.length} accounts total`);
    } finally {
      cleanup();
    }
  });

// === run ===
program
  .command('run')
  .description('Ingest new posts, then build and deliver the daily report')
  .option('--ingest-only', 'Only run the ingestion cycle')
  .action(async (opts: { ingestOnly?: boolean }) => {
    const { db, config, cleanup } = await getDb();
    try {
      if (opts.ingestOnly) {
        const result = await createMonitor(db, config).runIngestionCycle();
        printRunStats(result);
        return;
      }

      const result = await runDailyReport(createReportDeps(db, config));
      printRunStats(result.ingest);
      log(`\n${result.summary.summary_text}`);
      log(`\n✓ Report written to ${result.reportPath}`);
      if (result.delivered.length > 0) log(`✓ Delivered via ${result.delivered.join(', ')}`);
    } finally {
      cleanup();
    }
  });

// === posts ===
program
  .command('posts')
  .description('Show stored posts (never calls the X API)')
  .option('-H, --hours <h>', 'Trailing window in hours')
  .option('-a, --accounts <list>', 'Comma-separated usernames')
  .option('--json', 'Print JSON')
  .action(async (opts: { hours?: string; accounts?: string; json?: boolean }) => {
    const { db, config, cleanup } = await getDb();
    try {
      const hours = opts.hours ? Number(opts.hours) : config.pacing.window_hours;
      if (!Number.isFinite(hours) || hours <= 0) {
        log(`Invalid --hours: ${opts.hours}`);
        process.exitCode = 1;
        return;
      }
      const usernames = opts.accounts?.split(',').map((s) => s.trim()).filter(Boolean);
      const posts = createMonitor(db, config).queryPosts(hoursBefore(new Date(), hours), usernames);

      if (opts.json) {
        log(JSON.stringify(posts, null, 2));
        return;
      }
      for (const post of posts) log(formatPost(post));
      log(`\n${posts.length} posts in the last ${hours}h`);
    } finally {
      cleanup();
    }
  });

// === history ===
program
  .command('history')
  .description('Show recent daily summaries')
  .option('-d, --days <n>', 'Number of days', '7')
  .action(async (opts: { days: string }) => {
    const { db, cleanup } = await getDb();
    try {
      const summaries = getRecentSummaries(db, parseInt(opts.days, 10));
      if (summaries.length === 0) {
        log('No summaries yet. Use: postwatch run');
        return;
      }
      for (const s of summaries) {
        log(`${s.date}  ${s.total_posts} posts from ${s.accounts_monitored} accounts`);
        log(`  ${s.summary_text}`);
        for (const insight of s.key_insights) log(`  • ${insight}`);
        log('');
      }
    } finally {
      cleanup();
    }
  });

// === regenerate ===
program
  .command('regenerate')
  .description('Rebuild a report from stored posts')
  .option('-d, --date <YYYY-MM-DD>', 'UTC day to rebuild (default: trailing window)')
  .option('-n, --notify', 'Also deliver the rebuilt report')
  .action(async (opts: { date?: string; notify?: boolean }) => {
    const { db, config, cleanup } = await getDb();
    try {
      const result = await regenerateReport(createReportDeps(db, config), {
        date: opts.date,
        notify: opts.notify ?? false,
      });
      if (!result) {
        log('No stored posts for that period.');
        return;
      }
      log(result.summary.summary_text);
      log(`\n✓ Report written to ${result.reportPath}`);
      if (result.delivered.length > 0) log(`✓ Delivered via ${result.delivered.join(', ')}`);
    } finally {
      cleanup();
    }
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP API and the report scheduler')
  .option('-p, --port <port>', 'Port number')
  .option('--no-schedule', 'Do not start the report scheduler')
  .action(async (opts: { port?: string; schedule: boolean }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      schedule: opts.schedule,
    });
  });

// === Helper to get DB connection ===
async function getDb(): Promise<{ db: Db; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run postwatch init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);

  return { db, config, cleanup: () => closeDb() };
}

function printRunStats(result: IngestRunResult): void {
  const s = result.stats;
  log(`Ingest ${result.aborted ? 'aborted' : 'complete'}:`);
  log(`  Accounts:          ${s.accountsSucceeded}/${s.accountsTotal} ok, ${s.accountsFailed} failed`);
  log(`  Posts fetched:     ${s.postsFetched}`);
  log(`  Posts new:         ${s.postsNew}`);
  log(`  Posts duplicate:   ${s.postsDuplicate}`);
  log(`  API requests:      ${s.requests} (${s.quotaHits} quota hits)`);
  log(`  Window posts:      ${result.posts.length}`);
  log(`  Duration:          ${result.durationMs}ms`);

  if (s.failures.length > 0) {
    log('\nFailures:');
    for (const f of s.failures) log(`  @${f.username}: ${f.reason} (${f.message})`);
  }
  if (s.starved.length > 0) {
    log(`\n⚠ Not ingested for several runs: ${s.starved.map((u) => `@${u}`).join(', ')}`);
  }
}

function formatPost(post: Post): string {
  const kind = postKind(post);
  const tag = kind === 'original' ? '' : ` [${kind}]`;
  const text = post.content.replace(/\s+/g, ' ').trim();
  return `${post.created_at.slice(0, 16).replace('T', ' ')}  @${post.author_username}${tag}: ${text.slice(0, 140)}`;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof PostwatchError) {
    log(`✗ ${err.message}`);
  } else {
    log(`✗ Unexpected error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
});
