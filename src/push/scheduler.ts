/**
 * Scheduler: node-cron job for the daily ingest + report run.
 * Started by `postwatch serve`.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { runDailyReport, type ReportDeps } from '../report/dailyReport.js';

let reportTask: cron.ScheduledTask | null = null;
let running = false;

/**
 * One scheduled run. A tick that fires while the previous run is still going
 * is skipped.
 */
export async function runScheduledReport(deps: ReportDeps): Promise<boolean> {
  if (running) {
    logger.warn('Previous report run still in progress, skipping tick');
    return false;
  }
  running = true;
  try {
    await runDailyReport(deps);
    return true;
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Scheduled report failed');
    return false;
  } finally {
    running = false;
  }
}

/**
 * Start the scheduled report task. Returns false when the cron expression is invalid.
 */
export function startScheduler(deps: ReportDeps, schedule: Config['schedule']): boolean {
  if (!cron.validate(schedule.report_cron)) {
    logger.warn({ report_cron: schedule.report_cron }, 'Invalid report_cron expression, skipping scheduler');
    return false;
  }

  reportTask = cron.schedule(
    schedule.report_cron,
    () => {
      void runScheduledReport(deps);
    },
    { timezone: schedule.timezone },
  );

  logger.info({ report_cron: schedule.report_cron, timezone: schedule.timezone }, 'Scheduler started');
  return true;
}

/**
 * Stop the scheduled task (for graceful shutdown).
 */
export function stopScheduler(): void {
  reportTask?.stop();
  reportTask = null;
  logger.info('Scheduler stopped');
}
