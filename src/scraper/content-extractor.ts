/**
 * Article Content Extractor
 *
 * Turns a parsed article page into an Article record. Every field is found by
 * walking an ordered selector list and stopping at the first usable match.
 * A page without a title or body is reported as skipped, never thrown.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { computeFingerprint } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import type { ExtractionResult } from '../types/index.js';
import { parsePublishedDate } from './date-parser.js';
import type { ArticleSelectors } from './types.js';
import type { UrlClassifier } from './url-classifier.js';

/**
 * Subtrees that are never article content
 */
const NON_CONTENT_SELECTORS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'nav',
  'header',
  'footer',
  'aside',
  '.advertisement',
  '.ads',
  '.social-share',
  '.comments',
  '.sidebar',
  '.menu',
  '.navigation',
];

/** Attributes that survive sanitizing, by tag */
const KEPT_ATTRIBUTES: Record<string, readonly string[]> = {
  a: ['href'],
  img: ['src', 'alt'],
};

const TITLE_SEPARATOR = '|';
const COMMENT_NODE = 8;

export interface ContentExtractorOptions {
  selectors: ArticleSelectors;
  classifier: UrlClassifier;
  now?: () => Date;
}

export interface SanitizedBody {
  markup: string;
  plainText: string;
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Run a configured selector; an invalid selector matches nothing
 */
export function select($: CheerioAPI, selector: string): AnyNode[] {
  try {
    return $(selector).toArray();
  } catch (error) {
    logger.warn({ selector, error }, 'Invalid selector, ignoring');
    return [];
  }
}

function firstText($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    for (const element of select($, selector)) {
      const text = normalizeText($(element).text());
      if (text) {
        return text;
      }
    }
  }
  return undefined;
}

/**
 * Drop non-content subtrees, attributes and comments from body markup
 */
export function sanitizeBody(html: string): SanitizedBody {
  const $ = cheerio.load(html, null, false);

  $(NON_CONTENT_SELECTORS.join(', ')).remove();

  $.root()
    .find('*')
    .each((_, element) => {
      const kept = KEPT_ATTRIBUTES[element.tagName] ?? [];
      for (const name of Object.keys(element.attribs)) {
        if (!kept.includes(name)) {
          $(element).removeAttr(name);
        }
      }
    });

  $.root()
    .find('*')
    .addBack()
    .contents()
    .filter((_, node) => node.nodeType === COMMENT_NODE)
    .remove();

  return {
    markup: $.html().trim(),
    plainText: normalizeText($.root().text()),
  };
}

export class ContentExtractor {
  private readonly selectors: ArticleSelectors;
  private readonly classifier: UrlClassifier;
  private readonly now: () => Date;

  constructor(options: ContentExtractorOptions) {
    this.selectors = options.selectors;
    this.classifier = options.classifier;
    this.now = options.now ?? (() => new Date());
  }

  extract($: CheerioAPI, url: string): ExtractionResult {
    if (this.classifier.classify(url) !== 'article') {
      return { status: 'skipped', url, reason: 'not-article' };
    }

    const title = this.extractTitle($);
    if (!title) {
      return { status: 'skipped', url, reason: 'missing-title' };
    }

    const body = this.extractBody($);
    if (body === undefined) {
      return { status: 'skipped', url, reason: 'missing-body' };
    }

    const { markup, plainText } = sanitizeBody(body);
    if (!markup) {
      return { status: 'skipped', url, reason: 'missing-body' };
    }

    const author = firstText($, this.selectors.author);
    const publishedAt = this.extractPublishedDate($);

    return {
      status: 'extracted',
      article: {
        url,
        title,
        rawBody: markup,
        plainText,
        ...(author ? { author } : {}),
        ...(publishedAt ? { publishedAt } : {}),
        scrapedAt: this.now(),
        wordCount: countWords(plainText),
        fingerprint: computeFingerprint(title, plainText),
      },
    };
  }

  /**
   * Configured selectors first, then the `<title>` tag up to the first `|`
   */
  extractTitle($: CheerioAPI): string | undefined {
    const fromSelectors = firstText($, this.selectors.title);
    if (fromSelectors) {
      return fromSelectors;
    }

    const pageTitle = normalizeText($('title').first().text());
    return pageTitle
      .split(TITLE_SEPARATOR)
      .map((segment) => segment.trim())
      .find((segment) => segment.length > 0);
  }

  /**
   * Inner markup of the first non-empty match of the first selector that has one
   */
  extractBody($: CheerioAPI): string | undefined {
    for (const selector of this.selectors.content) {
      for (const element of select($, selector)) {
        const html = $(element).html() ?? '';
        if (html.trim()) {
          return html;
        }
      }
    }
    return undefined;
  }

  /**
   * The `datetime` attribute wins over visible text. Only the first non-empty
   * match of each selector is tried.
   */
  extractPublishedDate($: CheerioAPI): Date | undefined {
    for (const selector of this.selectors.publishedDate) {
      for (const element of select($, selector)) {
        const node = $(element);
        const raw = node.attr('datetime')?.trim() || normalizeText(node.text());
        if (!raw) {
          continue;
        }

        const parsed = parsePublishedDate(raw);
        if (parsed) {
          return parsed;
        }

        logger.debug({ selector, value: raw }, 'Could not parse date');
        break;
      }
    }
    return undefined;
  }
}
