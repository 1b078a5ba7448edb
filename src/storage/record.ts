/**
 * Article <-> JSONL record mapping
 */

import { z } from 'zod';
import type { Article, ArticleRecord } from '../types/index.js';

export const articleRecordSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  content: z.string(),
  plain_text: z.string(),
  author: z.string().optional(),
  published_date: z.string().datetime({ offset: true }).optional(),
  scraped_at: z.string().datetime({ offset: true }),
  word_count: z.number().int().nonnegative(),
  content_hash: z.string().min(1),
});

export type DecodeResult = { ok: true; record: ArticleRecord } | { ok: false; error: string };

/**
 * Optional fields are omitted, never written as null
 */
export function toRecord(article: Article): ArticleRecord {
  const record: ArticleRecord = {
    url: article.url,
    title: article.title,
    content: article.rawBody,
    plain_text: article.plainText,
    scraped_at: article.scrapedAt.toISOString(),
    word_count: article.wordCount,
    content_hash: article.fingerprint,
  };

  if (article.author) {
    record.author = article.author;
  }
  if (article.publishedAt) {
    record.published_date = article.publishedAt.toISOString();
  }

  return record;
}

export function fromRecord(record: ArticleRecord): Article {
  return {
    url: record.url,
    title: record.title,
    rawBody: record.content,
    plainText: record.plain_text,
    ...(record.author ? { author: record.author } : {}),
    ...(record.published_date ? { publishedAt: new Date(record.published_date) } : {}),
    scrapedAt: new Date(record.scraped_at),
    wordCount: record.word_count,
    fingerprint: record.content_hash,
  };
}

/**
 * One line, without the trailing newline. Throws on unencodable values
 * (e.g. an invalid Date).
 */
export function encodeRecord(article: Article): string {
  return JSON.stringify(toRecord(article));
}

export function decodeRecord(line: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const result = articleRecordSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      error: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }

  return { ok: true, record: result.data };
}
