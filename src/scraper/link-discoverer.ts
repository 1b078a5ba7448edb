/**
 * Link Discoverer
 *
 * Finds candidate follow-up URLs on a fetched page. Only two shapes are
 * followed: entries under the section path (slugs and categories) and
 * paginated listings. The visited set is not consulted here.
 */

import type { CheerioAPI } from 'cheerio';
import type { DiscoveredLink } from '../types/index.js';
import type { UrlClassifier } from './url-classifier.js';

export interface LinkDiscovererOptions {
  classifier: UrlClassifier;
  /** e.g. `/posts/` */
  sectionPath: string;
  /** e.g. `/page/` */
  paginationMarker: string;
}

/**
 * Resolve an href against the page URL. Non-http(s) targets and hrefs that
 * do not resolve yield null; the fragment is always dropped.
 */
export function resolveLink(href: string, pageUrl: string): string | null {
  let resolved: URL;
  try {
    resolved = new URL(href.trim(), pageUrl);
  } catch {
    return null;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return null;
  }

  resolved.hash = '';
  return resolved.href;
}

export class LinkDiscoverer {
  private readonly classifier: UrlClassifier;
  private readonly sectionPath: string;
  private readonly paginationMarker: string;

  constructor(options: LinkDiscovererOptions) {
    this.classifier = options.classifier;
    this.sectionPath = options.sectionPath;
    this.paginationMarker = options.paginationMarker;
  }

  discover($: CheerioAPI, pageUrl: string): DiscoveredLink[] {
    const seen = new Set<string>();
    const links: DiscoveredLink[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href');
      if (!href) return;

      const url = resolveLink(href, pageUrl);
      if (!url || seen.has(url) || !this.isFollowable(url)) return;

      seen.add(url);
      links.push({ url, pageType: this.classifier.classify(url) });
    });

    return links;
  }

  isFollowable(url: string): boolean {
    if (url.includes(this.paginationMarker)) {
      return true;
    }

    return (
      url.includes(this.sectionPath) &&
      url.endsWith('/') &&
      !url.endsWith(this.sectionPath)
    );
  }
}
