/**
 * URL Classifier
 *
 * Tags a URL as article, listing or other from its shape alone. Rules run in
 * order and the first match wins: exclusions, article patterns, listing
 * patterns. Exclusions always win, so a static asset that happens to look like
 * an article slug is never extracted.
 */

import type { PageType } from '../types/index.js';

export interface UrlClassifierOptions {
  /** Glob patterns; `*` matches any run of characters, `?` one character */
  excludePatterns: readonly string[];
  /** Regular expressions matched against the full URL */
  articlePatterns: readonly string[];
  listingPatterns: readonly string[];
}

/**
 * Compile a glob into a regular expression.
 *
 * Patterns are anchored at the end of the URL and free at the start, so
 * `*.jpg` means "ends in .jpg" and `/tags/*` means "contains /tags/". A
 * trailing `$` is accepted as an explicit end anchor.
 */
export function globToRegExp(glob: string): RegExp {
  const body = glob.endsWith('$') ? glob.slice(0, -1) : glob;
  let source = '';

  for (const char of body) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    }
  }

  return new RegExp(`${source}$`);
}

export class UrlClassifier {
  private readonly excludes: RegExp[];
  private readonly articles: RegExp[];
  private readonly listings: RegExp[];

  constructor(options: UrlClassifierOptions) {
    this.excludes = options.excludePatterns.map(globToRegExp);
    this.articles = options.articlePatterns.map((pattern) => new RegExp(pattern));
    this.listings = options.listingPatterns.map((pattern) => new RegExp(pattern));
  }

  classify(url: string): PageType {
    if (!URL.canParse(url)) {
      return 'other';
    }

    if (this.isExcluded(url)) {
      return 'other';
    }

    if (this.articles.some((pattern) => pattern.test(url))) {
      return 'article';
    }

    if (this.listings.some((pattern) => pattern.test(url))) {
      return 'listing';
    }

    return 'other';
  }

  isExcluded(url: string): boolean {
    return this.excludes.some((pattern) => pattern.test(url));
  }
}
