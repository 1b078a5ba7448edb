import * as cheerio from 'cheerio';
import type { FetchResult, PageFetcher } from '../../scraper/types.js';

/**
 * In-memory site: URL -> HTML. Unknown URLs answer 404.
 */
export class FakeSiteFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchAndParse(url: string): Promise<FetchResult> {
    this.requested.push(url);
    const html = this.pages[url];

    if (html === undefined) {
      return {
        ok: false,
        failure: { url, reason: 'http_error', statusCode: 404, message: 'HTTP 404: Not Found' },
      };
    }

    return {
      ok: true,
      page: { url, requestedUrl: url, statusCode: 200, html, $: cheerio.load(html) },
    };
  }
}

export function articlePage(title: string, body: string, links: string[] = []): string {
  const anchors = links.map((href) => `<a href="${href}">link</a>`).join('');
  return `<html><head><title>${title} | Example Blog</title></head><body><article><h1>${title}</h1><p>${body}</p></article>${anchors}</body></html>`;
}

export function listingPage(links: string[]): string {
  const anchors = links.map((href) => `<li><a href="${href}">link</a></li>`).join('');
  return `<html><head><title>Example Blog</title></head><body><ul>${anchors}</ul></body></html>`;
}
