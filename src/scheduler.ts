/**
 * Scheduler
 *
 * Re-runs the crawl on a cron schedule. Each run is a full crawl; content
 * saved by earlier runs is skipped through the fingerprint index.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import { logCrawlSummary, runCrawl, type CrawlOptions } from './pipeline.js';
import { logger } from './utils/logger.js';

export interface SchedulerOptions extends Omit<CrawlOptions, 'signal'> {
  cronExpression?: string;
  timezone?: string;
}

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let currentRun: Promise<void> | null = null;
let currentAbort: AbortController | null = null;

/**
 * Execute one crawl; skipped while the previous one is still running
 */
export async function executeScheduledCrawl(options: Omit<CrawlOptions, 'signal'> = {}): Promise<boolean> {
  if (currentRun) {
    logger.warn('Crawl already running, skipping this execution');
    return false;
  }

  const startTime = new Date();
  const controller = new AbortController();
  currentAbort = controller;

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled crawl starting');

  currentRun = runCrawl({ ...options, signal: controller.signal })
    .then((result) => {
      logCrawlSummary(result);
      logger.info(
        { startTime: startTime.toISOString(), endTime: new Date().toISOString() },
        'Scheduled crawl completed'
      );
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'Scheduled crawl failed');
    })
    .finally(() => {
      currentRun = null;
      currentAbort = null;
    });

  await currentRun;
  return true;
}

/**
 * Start the scheduler
 */
export function startScheduler(options: SchedulerOptions = {}): void {
  const { cronExpression = config.scheduler.cronExpression, timezone = config.scheduler.timezone, ...crawlOptions } =
    options;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  if (scheduledTask) {
    logger.warn('Scheduler already started');
    return;
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      executeScheduledCrawl(crawlOptions).catch((error: unknown) => {
        logger.error({ error }, 'Crawl execution failed');
      });
    },
    { timezone }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler and cancel a crawl in progress, waiting for it to wind down
 */
export async function stopScheduler(): Promise<void> {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }

  if (currentRun) {
    currentAbort?.abort();
    await currentRun;
  }
}

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}
