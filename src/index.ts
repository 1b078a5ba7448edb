#!/usr/bin/env node
/**
 * Article Crawler
 *
 * Crawls one website, extracts article content, deduplicates it by content
 * fingerprint and appends new articles to a JSONL file.
 *
 * Usage:
 *   node dist/index.js                   - Run one crawl and exit
 *   node dist/index.js --run             - Same as above
 *   node dist/index.js --service         - Stay alive and crawl on CRON_SCHEDULE
 *   node dist/index.js --dry-run         - Crawl without writing anything
 *   node dist/index.js --config=<path>   - Use another crawl configuration file
 *   node dist/index.js --verbose         - Debug logging
 */

import { config, ConfigError, loadCrawlConfig } from './config/index.js';
import { logCrawlSummary, runCrawl } from './pipeline.js';
import { startScheduler, stopScheduler } from './scheduler.js';
import { logger, setLogLevel } from './utils/logger.js';

const USAGE = `Usage: ${config.app.name} [options]

Options:
  --run              Run one crawl and exit (default)
  --service          Run as a service, crawling on CRON_SCHEDULE (${config.scheduler.cronExpression})
  --dry-run          Evaluate only: classify, extract and count, write nothing
  --config=<path>    Crawl configuration file (default: ${config.crawlConfigPath})
  --verbose          Debug logging
  --version          Print the version
  --help             Show this help
`;

// Parse command line arguments
const args = process.argv.slice(2);
const isService = args.includes('--service');
const dryRun = args.includes('--dry-run');
const configPath = args.find((arg) => arg.startsWith('--config='))?.slice('--config='.length) || config.crawlConfigPath;

async function runOnce(signal: AbortSignal): Promise<void> {
  const result = await runCrawl({ configPath, dryRun, signal });
  logCrawlSummary(result);
  if (signal.aborted) {
    logger.info('Crawl was cancelled before completion');
  }
}

async function main(): Promise<void> {
  if (args.includes('--help')) {
    process.stdout.write(USAGE);
    return;
  }

  if (args.includes('--version')) {
    process.stdout.write(`${config.app.version}\n`);
    return;
  }

  if (args.includes('--verbose')) {
    setLogLevel('debug');
  }

  logger.info(
    { env: config.app.env, mode: isService ? 'service' : 'run-once', configPath, dryRun },
    'Starting application'
  );

  const controller = new AbortController();
  let shuttingDown = false;

  // Graceful shutdown: first signal drains in-flight pages, second one exits
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      logger.warn({ signal }, 'Forced exit');
      process.exit(130);
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    controller.abort();

    if (isService) {
      stopScheduler().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, 'Error while stopping scheduler');
          process.exit(1);
        }
      );
    }
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  if (isService) {
    // Fail fast on a broken configuration instead of at the first tick
    loadCrawlConfig(configPath);
    startScheduler({ configPath, dryRun });
    logger.info('Running in service mode - waiting for scheduled crawls');
    return;
  }

  await runOnce(controller.signal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, error.message);
  } else {
    logger.fatal({ error }, 'Application failed');
  }
  process.exit(1);
});
