/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'article-crawler',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  crawlConfigPath: env.CRAWLER_CONFIG,

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
    pretty: env.LOG_PRETTY ?? env.NODE_ENV === 'development',
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  retry: {
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },

  progressInterval: 50,
} as const;

export type Config = typeof config;
export { env } from './env.js';
export {
  loadCrawlConfig,
  parseCrawlConfig,
  ConfigError,
  type CrawlConfig,
} from './crawl-config.js';
