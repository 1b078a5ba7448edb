/**
 * Traversal Orchestrator
 *
 * Owns the frontier and the crawl statistics. Per fetched page:
 * classify -> extract and store when it is an article -> discover links on
 * every page -> enqueue the new ones one level deeper. Every URL, start URLs
 * included, passes the same scope gate: allowed host, no exclusion match,
 * depth within the limit.
 */

import type { ContentExtractor } from '../scraper/content-extractor.js';
import type { LinkDiscoverer } from '../scraper/link-discoverer.js';
import type { FetchResult } from '../scraper/types.js';
import type { UrlClassifier } from '../scraper/url-classifier.js';
import type { ArticleStore } from '../storage/types.js';
import type { Article, CrawlStats, FrontierState, SaveStatus } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { isAllowedHost, normalizeUrl } from '../utils/url.js';
import type { CrawlEngine, VisitRequest } from './engine.js';
import { Frontier } from './frontier.js';

export interface CrawlOrchestratorOptions {
  engine: CrawlEngine;
  classifier: UrlClassifier;
  extractor: ContentExtractor;
  discoverer: LinkDiscoverer;
  store: ArticleStore;
  allowedDomains: readonly string[];
  maxDepth: number;
  /** Consult the store through `exists` only; nothing is written */
  evaluateOnly?: boolean;
  /** Log progress every N visited URLs */
  progressInterval?: number;
}

export type ScopeDecision = 'accepted' | 'known' | 'rejected';

function emptyStats(evaluateOnly: boolean): CrawlStats {
  return {
    startedAt: new Date(),
    finishedAt: null,
    durationMs: 0,
    urlsVisited: 0,
    pagesByType: { article: 0, listing: 0, other: 0 },
    articlesExtracted: 0,
    articlesSaved: 0,
    articlesSkipped: 0,
    duplicates: 0,
    fetchErrors: 0,
    writeErrors: 0,
    rejectedUrls: 0,
    evaluateOnly,
  };
}

export class CrawlOrchestrator {
  readonly frontier = new Frontier();
  private readonly options: CrawlOrchestratorOptions;
  private readonly evaluateOnly: boolean;
  private readonly progressInterval: number;
  /** Fingerprints accepted during an evaluate-only run */
  private readonly evaluated = new Set<string>();
  private stats: CrawlStats;

  constructor(options: CrawlOrchestratorOptions) {
    this.options = options;
    this.evaluateOnly = options.evaluateOnly ?? false;
    this.progressInterval = options.progressInterval ?? 50;
    this.stats = emptyStats(this.evaluateOnly);
  }

  async crawl(startUrls: readonly string[], signal?: AbortSignal): Promise<CrawlStats> {
    this.stats = emptyStats(this.evaluateOnly);

    logger.info(
      {
        startUrls: startUrls.length,
        maxDepth: this.options.maxDepth,
        evaluateOnly: this.evaluateOnly,
      },
      'Starting crawl'
    );

    for (const url of startUrls) {
      const decision = this.enqueue(url, 0);
      if (decision === 'rejected') {
        logger.warn({ url }, 'Start URL is out of scope, ignoring');
      }
    }

    const onAbort = () => {
      logger.warn('Crawl cancelled, waiting for in-flight pages');
      this.options.engine.stop();
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      await this.options.engine.run((visit, result) => this.handlePage(visit, result));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const finishedAt = new Date();
    this.stats.finishedAt = finishedAt;
    this.stats.durationMs = finishedAt.getTime() - this.stats.startedAt.getTime();

    logger.info({ stats: this.stats, frontier: this.frontier.countByState() }, 'Crawl finished');
    return this.getStats();
  }

  /**
   * Point-in-time copy; safe to call while a crawl is running
   */
  getStats(): CrawlStats {
    return { ...this.stats, pagesByType: { ...this.stats.pagesByType } };
  }

  /**
   * Scope gate, then atomic frontier insert
   */
  enqueue(url: string, depth: number, discoveredFrom?: string): ScopeDecision {
    const normalized = normalizeUrl(url);
    if (
      !normalized ||
      !isAllowedHost(normalized, this.options.allowedDomains) ||
      this.options.classifier.isExcluded(normalized) ||
      depth > this.options.maxDepth
    ) {
      this.stats.rejectedUrls += 1;
      logger.trace({ url, depth }, 'URL rejected by scope gate');
      return 'rejected';
    }

    const pageType = this.options.classifier.classify(normalized);
    const entry = this.frontier.tryAdd(normalized, depth, pageType, discoveredFrom);
    if (!entry) {
      return 'known';
    }

    if (!this.options.engine.scheduleVisit({ url: entry.url, depth })) {
      this.frontier.transition(entry.url, 'skipped');
      return 'known';
    }

    return 'accepted';
  }

  private async handlePage(visit: VisitRequest, result: FetchResult): Promise<void> {
    this.frontier.transition(visit.url, 'visiting');
    this.stats.urlsVisited += 1;

    if (this.stats.urlsVisited % this.progressInterval === 0) {
      logger.info(
        {
          visited: this.stats.urlsVisited,
          saved: this.stats.articlesSaved,
          duplicates: this.stats.duplicates,
          errors: this.stats.fetchErrors,
        },
        'Crawl progress'
      );
    }

    let outcome: FrontierState = 'failed';
    try {
      outcome = await this.processPage(visit, result);
    } catch (error) {
      logger.error({ url: visit.url, error }, 'Failed to process page');
    } finally {
      this.frontier.transition(visit.url, outcome);
    }
  }

  private async processPage(visit: VisitRequest, result: FetchResult): Promise<FrontierState> {
    if (!result.ok) {
      const { reason, statusCode, message } = result.failure;
      this.stats.fetchErrors += 1;
      logger.warn({ url: visit.url, reason, statusCode, error: message }, 'Fetch failed');
      return 'failed';
    }

    const { page } = result;
    const pageType = this.options.classifier.classify(page.url);
    this.stats.pagesByType[pageType] += 1;
    logger.debug({ url: page.url, pageType, depth: visit.depth }, 'Visited page');

    let outcome: FrontierState = 'skipped';

    if (pageType === 'article') {
      const extraction = this.options.extractor.extract(page.$, page.url);
      if (extraction.status === 'skipped') {
        this.stats.articlesSkipped += 1;
        logger.debug({ url: page.url, reason: extraction.reason }, 'Article not extractable');
      } else {
        this.stats.articlesExtracted += 1;
        const status = await this.persist(extraction.article);
        outcome = status === 'error' ? 'failed' : 'extracted';
      }
    }

    const links = this.options.discoverer.discover(page.$, page.url);
    const nextDepth = visit.depth + 1;
    if (nextDepth <= this.options.maxDepth) {
      for (const link of links) {
        this.enqueue(link.url, nextDepth, page.url);
      }
    }

    return outcome;
  }

  private async persist(article: Article): Promise<SaveStatus> {
    if (this.evaluateOnly) {
      const { fingerprint } = article;
      if (this.options.store.exists(fingerprint) || this.evaluated.has(fingerprint)) {
        this.stats.duplicates += 1;
        logger.debug({ url: article.url }, 'Duplicate content (evaluate-only)');
        return 'duplicate';
      }
      this.evaluated.add(fingerprint);
      this.stats.articlesSaved += 1;
      logger.info({ url: article.url, title: article.title }, 'Would save article');
      return 'saved';
    }

    let status: SaveStatus;
    try {
      status = await this.options.store.save(article);
    } catch (error) {
      logger.error({ url: article.url, error }, 'Store rejected article');
      status = 'error';
    }

    switch (status) {
      case 'saved':
        this.stats.articlesSaved += 1;
        logger.info({ url: article.url, title: article.title, words: article.wordCount }, 'Saved article');
        break;
      case 'duplicate':
        this.stats.duplicates += 1;
        logger.debug({ url: article.url }, 'Duplicate content, not saved');
        break;
      case 'error':
        this.stats.writeErrors += 1;
        break;
    }

    return status;
  }
}
