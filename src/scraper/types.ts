/**
 * Scraper Types
 */

import type { CheerioAPI } from 'cheerio';

/**
 * A fetched HTML page, parsed once and shared by every pipeline stage
 */
export interface ParsedPage {
  /** Final URL after redirects */
  url: string;
  requestedUrl: string;
  statusCode: number;
  html: string;
  $: CheerioAPI;
}

export type FetchFailureReason =
  | 'http_error'
  | 'timeout'
  | 'network'
  | 'robots_blocked'
  | 'not_html'
  | 'off_domain';

export interface FetchFailure {
  url: string;
  reason: FetchFailureReason;
  statusCode?: number;
  message: string;
}

export type FetchResult = { ok: true; page: ParsedPage } | { ok: false; failure: FetchFailure };

/**
 * Fetch-and-parse capability consumed by the crawl engine
 */
export interface PageFetcher {
  fetchAndParse(url: string): Promise<FetchResult>;
}

export interface ArticleSelectors {
  title: readonly string[];
  content: readonly string[];
  author: readonly string[];
  publishedDate: readonly string[];
}

export interface RobotsPolicy {
  isAllowed(url: string): Promise<boolean>;
  /** Crawl-delay in seconds, or null when robots.txt sets none */
  getCrawlDelay(origin: string): Promise<number | null>;
}
