import type { Article } from '../../types/index.js';
import { computeFingerprint } from '../../utils/hash.js';

export function makeArticle(overrides: Partial<Article> = {}): Article {
  const title = overrides.title ?? 'Hello World';
  const plainText = overrides.plainText ?? 'Some article text';

  return {
    url: 'https://blog.example.com/posts/hello-world/',
    title,
    rawBody: `<p>${plainText}</p>`,
    plainText,
    scrapedAt: new Date('2024-06-01T08:00:00.000Z'),
    wordCount: plainText.split(/\s+/).length,
    fingerprint: computeFingerprint(title, plainText),
    ...overrides,
  };
}

/**
 * Clock that advances one second per call, in local time
 */
export function steppingClock(start = new Date(2024, 0, 1, 12, 0, 0)): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}
