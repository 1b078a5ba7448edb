/**
 * Crawl Pipeline
 *
 * Wires one crawl run together:
 * 1. Load and validate the crawl configuration
 * 2. Open the article store (rebuilds the fingerprint index)
 * 3. Build fetcher, engine, classifier, extractor and discoverer
 * 4. Crawl from the start URLs until the frontier drains or the run is cancelled
 * 5. Report statistics and close the store
 */

import { config, loadCrawlConfig, type CrawlConfig } from './config/index.js';
import { CrawlOrchestrator, QueueCrawlEngine } from './crawler/index.js';
import {
  ContentExtractor,
  HttpFetcher,
  LinkDiscoverer,
  RobotsTxtPolicy,
  UrlClassifier,
  type PageFetcher,
  type RobotsPolicy,
} from './scraper/index.js';
import { createStore, type ArticleStore } from './storage/index.js';
import type { CrawlStats, StoreStats } from './types/index.js';
import { logger } from './utils/logger.js';

export interface CrawlOptions {
  /** Defaults to CRAWLER_CONFIG */
  configPath?: string;
  /** Evaluate-only: nothing is written */
  dryRun?: boolean;
  signal?: AbortSignal;
  /** Replaces the HTTP fetcher */
  fetcher?: PageFetcher;
}

export interface CrawlRunResult {
  stats: CrawlStats;
  store: StoreStats;
}

export interface CrawlerComponents {
  orchestrator: CrawlOrchestrator;
  classifier: UrlClassifier;
  extractor: ContentExtractor;
  fetcher: PageFetcher;
}

/**
 * Build every crawl component from a validated configuration
 */
export function createCrawler(
  crawlConfig: CrawlConfig,
  store: ArticleStore,
  options: { evaluateOnly?: boolean; fetcher?: PageFetcher } = {}
): CrawlerComponents {
  const { target, crawler, classification, discovery, selectors } = crawlConfig;

  const classifier = new UrlClassifier({
    excludePatterns: target.excludePatterns,
    articlePatterns: classification.articlePatterns,
    listingPatterns: classification.listingPatterns,
  });

  const robots: RobotsPolicy | undefined = crawler.respectRobotsTxt
    ? new RobotsTxtPolicy({ userAgent: crawler.userAgent, timeoutMs: crawler.timeout })
    : undefined;

  const fetcher =
    options.fetcher ??
    new HttpFetcher({
      userAgent: crawler.userAgent,
      timeoutMs: crawler.timeout,
      allowedDomains: target.allowedDomains,
      retry: { ...config.retry, maxAttempts: crawler.maxRetries + 1 },
      ...(robots ? { robots } : {}),
    });

  const engine = new QueueCrawlEngine({
    fetcher,
    parallelism: crawler.parallelJobs,
    requestDelayMs: crawler.requestDelay,
    ...(robots && !options.fetcher ? { robots } : {}),
  });

  const extractor = new ContentExtractor({ classifier, selectors: selectors.article });
  const discoverer = new LinkDiscoverer({
    classifier,
    sectionPath: discovery.sectionPath,
    paginationMarker: discovery.paginationMarker,
  });

  const orchestrator = new CrawlOrchestrator({
    engine,
    classifier,
    extractor,
    discoverer,
    store,
    allowedDomains: target.allowedDomains,
    maxDepth: crawler.maxDepth,
    evaluateOnly: options.evaluateOnly ?? false,
    progressInterval: config.progressInterval,
  });

  return { orchestrator, classifier, extractor, fetcher };
}

/**
 * Run one crawl to completion (or cancellation)
 */
export async function runCrawl(options: CrawlOptions = {}): Promise<CrawlRunResult> {
  const configPath = options.configPath ?? config.crawlConfigPath;
  const dryRun = options.dryRun ?? false;

  const crawlConfig = loadCrawlConfig(configPath);
  logger.info(
    {
      configPath,
      baseUrl: crawlConfig.target.baseUrl,
      parallelJobs: crawlConfig.crawler.parallelJobs,
      requestDelayMs: crawlConfig.crawler.requestDelay,
      maxDepth: crawlConfig.crawler.maxDepth,
      dryRun,
    },
    'Starting crawl pipeline'
  );

  const store = await createStore(crawlConfig.storage);

  try {
    const { orchestrator } = createCrawler(crawlConfig, store, {
      evaluateOnly: dryRun,
      ...(options.fetcher ? { fetcher: options.fetcher } : {}),
    });

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls, options.signal);
    const storeStats = await store.stats();

    return { stats, store: storeStats };
  } catch (error) {
    logger.error({ error }, 'Crawl pipeline failed');
    throw error;
  } finally {
    await store.close();
  }
}

/**
 * Human-readable run report
 */
export function logCrawlSummary(result: CrawlRunResult): void {
  const { stats, store } = result;

  logger.info('');
  logger.info(stats.evaluateOnly ? 'Crawl Summary (dry run):' : 'Crawl Summary:');
  logger.info(`  Visited:    ${stats.urlsVisited} URLs`);
  logger.info(
    `  Pages:      ${stats.pagesByType.article} article, ${stats.pagesByType.listing} listing, ${stats.pagesByType.other} other`
  );
  logger.info(`  Extracted:  ${stats.articlesExtracted} articles`);
  logger.info(`  ${stats.evaluateOnly ? 'New:      ' : 'Saved:    '}  ${stats.articlesSaved} articles`);
  logger.info(`  Duplicates: ${stats.duplicates}`);
  logger.info(`  Skipped:    ${stats.articlesSkipped} pages`);
  logger.info(`  Errors:     ${stats.fetchErrors} fetch, ${stats.writeErrors} write`);
  logger.info(`  Store:      ${store.count} records (${store.sizeBytes} bytes) in ${store.path}`);
  logger.info(`  Duration:   ${(stats.durationMs / 1000).toFixed(1)}s`);
}
