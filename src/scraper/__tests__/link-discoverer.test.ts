import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { defaultArticlePatterns, defaultListingPatterns } from '../../config/crawl-config.js';
import { LinkDiscoverer, resolveLink } from '../link-discoverer.js';
import { UrlClassifier } from '../url-classifier.js';

const PAGE_URL = 'https://blog.example.com/posts/';

const classifier = new UrlClassifier({
  excludePatterns: [],
  articlePatterns: defaultArticlePatterns('/posts/', '/page/'),
  listingPatterns: defaultListingPatterns('/posts/', '/page/'),
});

const discoverer = new LinkDiscoverer({
  classifier,
  sectionPath: '/posts/',
  paginationMarker: '/page/',
});

describe('LinkDiscoverer', () => {
  it('keeps section entries and paginated listings, in document order', () => {
    const $ = cheerio.load(`<html><body>
      <a href="/posts/first-post/">First</a>
      <a href="/posts/first-post/#comments">Comments</a>
      <a href="https://blog.example.com/posts/first-post/">First again</a>
      <a href="/posts/page/2/">Next page</a>
      <a href="/posts/">All posts</a>
      <a href="/about/">About</a>
      <a href="/posts/draft">Draft</a>
      <a href="mailto:someone@example.com">Mail</a>
      <a href="javascript:void(0)">Menu</a>
      <a href="second-post/">Second</a>
      <a>No href</a>
      <a href="https://other.example.org/posts/elsewhere/">Elsewhere</a>
    </body></html>`);

    expect(discoverer.discover($, PAGE_URL)).toEqual([
      { url: 'https://blog.example.com/posts/first-post/', pageType: 'article' },
      { url: 'https://blog.example.com/posts/page/2/', pageType: 'listing' },
      { url: 'https://blog.example.com/posts/second-post/', pageType: 'article' },
      { url: 'https://other.example.org/posts/elsewhere/', pageType: 'article' },
    ]);
  });

  it('returns nothing for a page without links', () => {
    expect(discoverer.discover(cheerio.load('<p>No links</p>'), PAGE_URL)).toEqual([]);
  });

  it('accepts pagination links outside the section path', () => {
    expect(discoverer.isFollowable('https://blog.example.com/page/3/')).toBe(true);
    expect(discoverer.isFollowable('https://blog.example.com/posts/')).toBe(false);
    expect(discoverer.isFollowable('https://blog.example.com/posts/hello/')).toBe(true);
  });

  it('uses the configured section path and marker', () => {
    const custom = new LinkDiscoverer({ classifier, sectionPath: '/blog/', paginationMarker: '?p=' });
    const $ = cheerio.load('<a href="/blog/entry/">e</a><a href="/blog/?p=2">p</a><a href="/posts/x/">x</a>');

    expect(custom.discover($, 'https://blog.example.com/').map((link) => link.url)).toEqual([
      'https://blog.example.com/blog/entry/',
      'https://blog.example.com/blog/?p=2',
    ]);
  });
});

describe('resolveLink', () => {
  it('resolves relative hrefs and drops the fragment', () => {
    expect(resolveLink('../other/#top', 'https://blog.example.com/posts/a/')).toBe(
      'https://blog.example.com/posts/other/'
    );
  });

  it('rejects non-http schemes', () => {
    expect(resolveLink('ftp://blog.example.com/file', PAGE_URL)).toBeNull();
    expect(resolveLink('tel:+100', PAGE_URL)).toBeNull();
  });
});
