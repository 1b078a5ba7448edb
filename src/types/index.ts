/**
 * Core types for the article crawler
 */

/**
 * Syntactic category of a URL, decided before any fetch-dependent work
 */
export type PageType = 'article' | 'listing' | 'other';

/**
 * One extracted unit of content. Never mutated after extraction.
 */
export interface Article {
  url: string;
  title: string;
  /** Sanitized inner markup of the content element */
  rawBody: string;
  plainText: string;
  author?: string;
  publishedAt?: Date;
  scrapedAt: Date;
  wordCount: number;
  /** Digest of `title + plainText` */
  fingerprint: string;
}

/**
 * On-disk shape of an article, one per JSONL line
 */
export interface ArticleRecord {
  url: string;
  title: string;
  content: string;
  plain_text: string;
  author?: string;
  published_date?: string;
  scraped_at: string;
  word_count: number;
  content_hash: string;
}

export type SkipReason = 'not-article' | 'missing-title' | 'missing-body';

export type ExtractionResult =
  | { status: 'extracted'; article: Article }
  | { status: 'skipped'; url: string; reason: SkipReason };

export type SaveStatus = 'saved' | 'duplicate' | 'error';

export interface BatchSaveResult {
  saved: number;
  skipped: number;
  failed: number;
}

export interface StoreStats {
  count: number;
  sizeBytes: number;
  lastModified: Date | null;
  format: StorageFormat;
  path: string;
}

export type StorageFormat = 'jsonl';

export type FrontierState = 'enqueued' | 'visiting' | 'extracted' | 'skipped' | 'failed';

export interface FrontierEntry {
  url: string;
  depth: number;
  pageType: PageType;
  state: FrontierState;
  discoveredFrom?: string;
}

export interface DiscoveredLink {
  url: string;
  pageType: PageType;
}

export interface CrawlStats {
  startedAt: Date;
  finishedAt: Date | null;
  durationMs: number;
  urlsVisited: number;
  pagesByType: Record<PageType, number>;
  articlesExtracted: number;
  articlesSaved: number;
  articlesSkipped: number;
  duplicates: number;
  fetchErrors: number;
  writeErrors: number;
  rejectedUrls: number;
  evaluateOnly: boolean;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
