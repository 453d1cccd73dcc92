import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Db } from '../../db/db.js';
import { Monitor } from '../../monitor/monitor.js';
import { SkipPolicy } from '../../monitor/quotaPolicy.js';
import type { ReportDeps } from '../../report/dailyReport.js';
import { runScheduledReport, startScheduler, stopScheduler } from '../scheduler.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { FakeProvider, NO_PACING, createTestDb, recordingSleep } from '../../monitor/__tests__/helpers.js';

let db: Db;
let tmpDir: string;
let provider: FakeProvider;
let deps: ReportDeps;

beforeEach(() => {
  db = createTestDb();
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'postwatch-sched-'));
  provider = new FakeProvider();
  deps = {
    db,
    monitor: new Monitor({
      db,
      provider,
      policy: new SkipPolicy(),
      pacing: NO_PACING,
      settings: { bootstrapHours: 24, windowHours: 24, starvationThreshold: 3 },
      sleep: recordingSleep().sleep,
    }),
    llm: { chat: vi.fn(), isConfigured: () => true },
    notifiers: [],
    report: { output_dir: tmpDir, max_posts_per_account: 10 },
    starvationThreshold: 3,
  };
});

afterEach(() => {
  stopScheduler();
  db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('runScheduledReport', () => {
  it('skips a tick while the previous run is still going', async () => {
    const first = runScheduledReport(deps);
    const second = await runScheduledReport(deps);

    expect(second).toBe(false);
    expect(await first).toBe(true);
    expect(await runScheduledReport(deps)).toBe(true);
  });

  it('logs a failed run instead of throwing', async () => {
    provider.addAccount('alice', 'A1');
    await deps.monitor.registerAccount('alice');
    provider.queueFetch('alice', new TypeError('boom'));

    expect(await runScheduledReport(deps)).toBe(false);
  });
});

describe('startScheduler', () => {
  it('refuses an invalid cron expression', () => {
    const schedule = { ...generateDefaultConfig().schedule, report_cron: 'not a cron' };
    expect(startScheduler(deps, schedule)).toBe(false);
  });

  it('accepts the default schedule', () => {
    expect(startScheduler(deps, generateDefaultConfig().schedule)).toBe(true);
  });
});
