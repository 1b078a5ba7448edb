/**
 * Selector check script
 *
 * Fetches one page and reports what each configured selector matches, to
 * help tune `selectors.article` for a new site. Nothing is written.
 *
 * Run with: npx tsx src/scraper/check-selectors.ts <url> [--config=<path>]
 */

import type { CheerioAPI } from 'cheerio';
import { config, loadCrawlConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ContentExtractor, normalizeText, select } from './content-extractor.js';
import { HttpFetcher } from './http-fetcher.js';
import { LinkDiscoverer } from './link-discoverer.js';
import { UrlClassifier } from './url-classifier.js';

const PREVIEW_LENGTH = 80;

export interface SelectorReport {
  selector: string;
  matches: number;
  preview: string | null;
}

export function reportSelectors($: CheerioAPI, selectors: readonly string[]): SelectorReport[] {
  return selectors.map((selector) => {
    const matches = select($, selector);
    const first = matches[0];
    const text = first ? normalizeText($(first).text()) : '';
    return {
      selector,
      matches: matches.length,
      preview: text ? text.slice(0, PREVIEW_LENGTH) : null,
    };
  });
}

async function checkSelectors(): Promise<void> {
  const args = process.argv.slice(2);
  const url = args.find((arg) => !arg.startsWith('--'));
  const configPath =
    args.find((arg) => arg.startsWith('--config='))?.slice('--config='.length) || config.crawlConfigPath;

  const crawlConfig = loadCrawlConfig(configPath);
  const target = url ?? crawlConfig.target.startUrls[0];
  if (!target) {
    throw new Error('No URL given and no start URL configured');
  }

  const { crawler, classification, discovery, selectors } = crawlConfig;
  const classifier = new UrlClassifier({
    excludePatterns: crawlConfig.target.excludePatterns,
    articlePatterns: classification.articlePatterns,
    listingPatterns: classification.listingPatterns,
  });

  const fetcher = new HttpFetcher({
    userAgent: crawler.userAgent,
    timeoutMs: crawler.timeout,
    allowedDomains: crawlConfig.target.allowedDomains,
    retry: { maxAttempts: 1 },
  });

  logger.info({ url: target, pageType: classifier.classify(target) }, 'Checking selectors');

  const result = await fetcher.fetchAndParse(target);
  if (!result.ok) {
    logger.error({ ...result.failure }, 'Fetch failed');
    return;
  }

  const { $ } = result.page;
  const fields = {
    title: selectors.article.title,
    content: selectors.article.content,
    author: selectors.article.author,
    publishedDate: selectors.article.publishedDate,
  };

  for (const [field, list] of Object.entries(fields)) {
    for (const report of reportSelectors($, list)) {
      logger.info({ field, ...report }, report.matches > 0 ? 'Selector matched' : 'Selector matched nothing');
    }
  }

  const extraction = new ContentExtractor({ classifier, selectors: selectors.article }).extract($, result.page.url);
  if (extraction.status === 'skipped') {
    logger.warn({ reason: extraction.reason }, 'Page would be skipped');
  } else {
    const { article } = extraction;
    logger.info(
      {
        title: article.title,
        author: article.author,
        publishedAt: article.publishedAt?.toISOString(),
        wordCount: article.wordCount,
        preview: article.plainText.slice(0, 200),
      },
      'Extraction result'
    );
  }

  const links = new LinkDiscoverer({ classifier, ...discovery }).discover($, result.page.url);
  logger.info({ count: links.length, sample: links.slice(0, 10) }, 'Links that would be followed');

  logger.info('=== Selector Check Complete ===');
}

if (process.argv[1]?.endsWith('check-selectors.ts') || process.argv[1]?.endsWith('check-selectors.js')) {
  checkSelectors().catch((error: unknown) => {
    logger.fatal({ error }, 'Selector check failed');
    process.exit(1);
  });
}
