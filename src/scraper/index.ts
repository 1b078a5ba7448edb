/**
 * Scraper Module
 *
 * Page-level pieces: URL classification, extraction, link discovery and the
 * HTTP fetch layer
 */

// Classification
export { UrlClassifier, globToRegExp, type UrlClassifierOptions } from './url-classifier.js';

// Extraction
export {
  ContentExtractor,
  sanitizeBody,
  normalizeText,
  countWords,
  type ContentExtractorOptions,
} from './content-extractor.js';
export { parsePublishedDate } from './date-parser.js';

// Discovery
export { LinkDiscoverer, resolveLink, type LinkDiscovererOptions } from './link-discoverer.js';

// Fetching
export { HttpFetcher, RETRYABLE_STATUS_CODES, type HttpFetcherOptions } from './http-fetcher.js';
export { RobotsTxtPolicy, parseRobotsTxt, isPathAllowed } from './robots.js';

export type {
  ParsedPage,
  PageFetcher,
  FetchResult,
  FetchFailure,
  FetchFailureReason,
  ArticleSelectors,
  RobotsPolicy,
} from './types.js';
