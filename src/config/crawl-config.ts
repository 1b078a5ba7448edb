/**
 * Crawl target configuration
 *
 * Loaded from a JSON file and validated with Zod before anything is crawled.
 * Any failure here is a ConfigError, which is fatal at startup.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse "2s", "500ms", "1.5m" or a bare number of milliseconds
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/);
  if (!match) {
    return null;
  }

  const [, amount, unit = 'ms'] = match;
  const multiplier = DURATION_UNITS[unit];
  if (amount === undefined || multiplier === undefined) {
    return null;
  }

  return Math.round(parseFloat(amount) * multiplier);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isValidRegExp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Article URL shapes under the section path. Pagination segments are excluded
 * so that `<section>page/2/` is a listing, not a category/slug article.
 */
export function defaultArticlePatterns(sectionPath: string, paginationMarker: string): string[] {
  const section = escapeRegExp(sectionPath);
  const pageSegment = escapeRegExp(paginationMarker.replace(/^\/+|\/+$/g, ''));
  const notPage = `(?!${pageSegment}/)`;

  return [
    `${section}${notPage}[^/]+/$`,
    `${section}\\d+/[^/]+/$`,
    `${section}${notPage}[^/]+/[^/]+/$`,
    `${section}${notPage}[^/]+-[^/]+/$`,
    `${section}${notPage}[^/]+_[^/]+/$`,
  ];
}

export function defaultListingPatterns(sectionPath: string, paginationMarker: string): string[] {
  const section = escapeRegExp(sectionPath);
  const pageSegment = escapeRegExp(paginationMarker.replace(/^\/+|\/+$/g, ''));

  return ['^https?://[^/]+/?$', `${section}$`, `${section}${pageSegment}/\\d+/$`];
}

const duration = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${String(value)}` });
      return z.NEVER;
    }
    return ms;
  });

/** Accepts an array or the comma-separated form `"h1, .post-title"` */
const selectorList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((selector) => selector.trim())
      .filter((selector) => selector.length > 0)
  );

const regexList = z.array(
  z.string().refine(isValidRegExp, (pattern) => ({ message: `Invalid regular expression: ${pattern}` }))
);

const crawlConfigSchema = z
  .object({
    target: z.object({
      baseUrl: z.string().url(),
      startUrls: z.array(z.string().url()).min(1, 'target.startUrls must contain at least one URL'),
      allowedDomains: z
        .array(z.string().min(1))
        .min(1, 'target.allowedDomains must contain at least one domain'),
      excludePatterns: z.array(z.string().min(1)).default([]),
    }),

    crawler: z.object({
      parallelJobs: z.number().int().positive(),
      requestDelay: duration.default(2000),
      timeout: duration.default(45000),
      maxDepth: z.number().int().nonnegative(),
      userAgent: z.string().min(1),
      respectRobotsTxt: z.boolean().default(true),
      /** Retries after the first attempt */
      maxRetries: z.number().int().min(0).default(3),
    }),

    classification: z
      .object({
        articlePatterns: regexList.optional(),
        listingPatterns: regexList.optional(),
      })
      .default({}),

    discovery: z
      .object({
        sectionPath: z.string().startsWith('/').default('/posts/'),
        paginationMarker: z.string().min(1).default('/page/'),
      })
      .default({}),

    selectors: z.object({
      article: z.object({
        title: selectorList.refine((list) => list.length > 0, 'selectors.article.title is required'),
        content: selectorList.refine((list) => list.length > 0, 'selectors.article.content is required'),
        author: selectorList.default([]),
        publishedDate: selectorList.default([]),
      }),
    }),

    storage: z.object({
      format: z.string().default('jsonl'),
      outputFile: z.string().min(1, 'storage.outputFile is required'),
      fsync: z.boolean().default(true),
      backup: z
        .object({
          enabled: z.boolean().default(false),
          directory: z.string().optional(),
          maxFiles: z.number().int().optional(),
        })
        .default({})
        .superRefine((backup, ctx) => {
          if (!backup.enabled) return;
          if (!backup.directory) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['directory'],
              message: 'storage.backup.directory is required when backups are enabled',
            });
          }
          if (backup.maxFiles === undefined || backup.maxFiles < 1) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['maxFiles'],
              message: 'storage.backup.maxFiles must be at least 1 when backups are enabled',
            });
          }
        }),
    }),
  })
  .transform((raw) => {
    const { sectionPath, paginationMarker } = raw.discovery;
    return {
      ...raw,
      classification: {
        articlePatterns:
          raw.classification.articlePatterns ?? defaultArticlePatterns(sectionPath, paginationMarker),
        listingPatterns:
          raw.classification.listingPatterns ?? defaultListingPatterns(sectionPath, paginationMarker),
      },
    };
  });

export type CrawlConfig = z.output<typeof crawlConfigSchema>;
export type CrawlConfigInput = z.input<typeof crawlConfigSchema>;

/**
 * Validate an already-parsed configuration object
 */
export function parseCrawlConfig(input: unknown): CrawlConfig {
  const result = crawlConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigError('Invalid crawl configuration', issues);
  }

  return result.data;
}

/**
 * Read and validate the crawl configuration file
 */
export function loadCrawlConfig(configPath: string): CrawlConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config file ${configPath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file ${configPath}: ${reason}`);
  }

  return parseCrawlConfig(parsed);
}
