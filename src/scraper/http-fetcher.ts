/**
 * HTTP Fetcher
 *
 * Native fetch with a per-request timeout, User-Agent, retries with
 * exponential backoff on network errors and transient status codes, and an
 * optional robots.txt policy. Responses are parsed with cheerio once, here.
 * Failures are returned as values with a reason; nothing is thrown.
 */

import * as cheerio from 'cheerio';
import type { RetryConfig } from '../types/index.js';
import { withRetry } from '../utils/retry.js';
import { isAllowedHost } from '../utils/url.js';
import type { FetchFailure, FetchFailureReason, FetchResult, PageFetcher, RobotsPolicy } from './types.js';

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  /** Network-level allow-list; also applied to the final URL after redirects */
  allowedDomains: readonly string[];
  retry?: Partial<RetryConfig>;
  robots?: RobotsPolicy;
}

export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];

const DEFAULT_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const;

class TransientStatusError extends Error {
  constructor(readonly statusCode: number, statusText: string) {
    super(`HTTP ${statusCode}: ${statusText}`);
    this.name = 'TransientStatusError';
  }
}

class FetchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

function failure(
  url: string,
  reason: FetchFailureReason,
  message: string,
  statusCode?: number
): FetchResult {
  const details: FetchFailure = { url, reason, message };
  if (statusCode !== undefined) {
    details.statusCode = statusCode;
  }
  return { ok: false, failure: details };
}

/** undici reports connection-level failures as `TypeError: fetch failed` */
function isTransient(error: Error): boolean {
  return (
    error instanceof TransientStatusError ||
    error instanceof FetchTimeoutError ||
    (error instanceof TypeError && error.message === 'fetch failed')
  );
}

function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) {
    return true;
  }
  return /html|xml/i.test(contentType);
}

export class HttpFetcher implements PageFetcher {
  private readonly options: HttpFetcherOptions;

  constructor(options: HttpFetcherOptions) {
    this.options = options;
  }

  async fetchAndParse(url: string): Promise<FetchResult> {
    if (!isAllowedHost(url, this.options.allowedDomains)) {
      return failure(url, 'off_domain', 'Host is not in the allowed domains');
    }

    if (this.options.robots && !(await this.options.robots.isAllowed(url))) {
      return failure(url, 'robots_blocked', 'URL disallowed by robots.txt');
    }

    try {
      return await withRetry(() => this.fetchOnce(url), {
        ...this.options.retry,
        shouldRetry: isTransient,
        label: url,
      });
    } catch (error) {
      if (error instanceof TransientStatusError) {
        return failure(url, 'http_error', error.message, error.statusCode);
      }
      if (error instanceof FetchTimeoutError) {
        return failure(url, 'timeout', error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      return failure(url, 'network', message);
    }
  }

  /**
   * Single attempt. Transient outcomes throw so that withRetry retries them;
   * permanent ones are returned.
   */
  private async fetchOnce(url: string): Promise<FetchResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { ...DEFAULT_HEADERS, 'User-Agent': this.options.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      });

      const finalUrl = response.url || url;
      if (!isAllowedHost(finalUrl, this.options.allowedDomains)) {
        return failure(url, 'off_domain', `Redirected outside the allowed domains to ${finalUrl}`);
      }

      if (RETRYABLE_STATUS_CODES.includes(response.status)) {
        throw new TransientStatusError(response.status, response.statusText);
      }

      if (!response.ok) {
        return failure(url, 'http_error', `HTTP ${response.status}: ${response.statusText}`, response.status);
      }

      const contentType = response.headers.get('content-type');
      if (!isHtmlContentType(contentType)) {
        return failure(url, 'not_html', `Unsupported content type: ${contentType}`, response.status);
      }

      const html = await response.text();

      return {
        ok: true,
        page: {
          url: finalUrl,
          requestedUrl: url,
          statusCode: response.status,
          html,
          $: cheerio.load(html),
        },
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchTimeoutError(this.options.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
