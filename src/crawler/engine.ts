/**
 * Crawl engine
 *
 * FIFO visit queue drained by up to `parallelism` concurrent workers. Every
 * request waits for its domain's pacing slot; a robots.txt Crawl-delay, when
 * longer, replaces the configured delay for that host. `run` resolves once
 * the queue is empty and nothing is in flight.
 */

import type { FetchResult, PageFetcher, RobotsPolicy } from '../scraper/types.js';
import { logger } from '../utils/logger.js';
import { DomainRateLimiter } from '../utils/rate-limiter.js';

export interface VisitRequest {
  url: string;
  depth: number;
}

export type PageHandler = (visit: VisitRequest, result: FetchResult) => Promise<void>;

export interface CrawlEngine {
  /** False when the engine is stopped and the visit was dropped */
  scheduleVisit(request: VisitRequest): boolean;
  run(handler: PageHandler): Promise<void>;
  /** Stop dequeuing; in-flight visits finish */
  stop(): void;
}

export interface QueueCrawlEngineOptions {
  fetcher: PageFetcher;
  parallelism: number;
  requestDelayMs: number;
  robots?: RobotsPolicy;
}

export class QueueCrawlEngine implements CrawlEngine {
  private readonly fetcher: PageFetcher;
  private readonly parallelism: number;
  private readonly robots: RobotsPolicy | undefined;
  private readonly limiter: DomainRateLimiter;
  /** One Crawl-delay lookup per origin; every visit to it waits on the same one */
  private readonly crawlDelays = new Map<string, Promise<void>>();
  private readonly queue: VisitRequest[] = [];
  private inFlight = 0;
  private stopped = false;
  private handler: PageHandler | null = null;
  private onIdle: (() => void) | null = null;

  constructor(options: QueueCrawlEngineOptions) {
    this.fetcher = options.fetcher;
    this.parallelism = Math.max(1, options.parallelism);
    this.robots = options.robots;
    this.limiter = new DomainRateLimiter(options.requestDelayMs);
  }

  scheduleVisit(request: VisitRequest): boolean {
    if (this.stopped) {
      return false;
    }
    this.queue.push(request);
    this.pump();
    return true;
  }

  run(handler: PageHandler): Promise<void> {
    if (this.handler) {
      return Promise.reject(new Error('Crawl engine is already running'));
    }

    this.handler = handler;
    return new Promise<void>((resolve) => {
      this.onIdle = resolve;
      this.pump();
    });
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    logger.info({ dropped: this.queue.length, inFlight: this.inFlight }, 'Crawl engine stopping');
    this.queue.length = 0;
    this.pump();
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) return;

    while (!this.stopped && this.inFlight < this.parallelism) {
      const request = this.queue.shift();
      if (!request) break;

      this.inFlight += 1;
      this.visit(request, handler).then(
        () => this.settle(),
        (error: unknown) => {
          logger.error({ url: request.url, error }, 'Unhandled error while visiting page');
          this.settle();
        }
      );
    }

    if (this.inFlight === 0 && this.queue.length === 0 && this.onIdle) {
      const resolve = this.onIdle;
      this.onIdle = null;
      resolve();
    }
  }

  private settle(): void {
    this.inFlight -= 1;
    this.pump();
  }

  private async visit(request: VisitRequest, handler: PageHandler): Promise<void> {
    const { host, origin } = new URL(request.url);

    await this.applyCrawlDelay(host, origin);
    await this.limiter.waitForSlot(host);

    const result = await this.fetcher.fetchAndParse(request.url);
    await handler(request, result);
  }

  private applyCrawlDelay(host: string, origin: string): Promise<void> {
    if (!this.robots) return Promise.resolve();

    let pending = this.crawlDelays.get(origin);
    if (!pending) {
      pending = this.loadCrawlDelay(this.robots, host, origin);
      this.crawlDelays.set(origin, pending);
    }
    return pending;
  }

  private async loadCrawlDelay(robots: RobotsPolicy, host: string, origin: string): Promise<void> {
    const seconds = await robots.getCrawlDelay(origin);
    if (seconds !== null && seconds * 1000 > this.limiter.intervalFor(host)) {
      this.limiter.setInterval(host, seconds * 1000);
      logger.info({ host, crawlDelaySeconds: seconds }, 'Using robots.txt crawl delay');
    }
  }
}
