import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseCrawlConfig, type CrawlConfigInput } from '../../config/crawl-config.js';
import { createCrawler } from '../../pipeline.js';
import { JsonlStore } from '../../storage/jsonl-store.js';
import type { ArticleStore } from '../../storage/types.js';
import { FakeSiteFetcher, articlePage, listingPage } from './fake-fetcher.js';

const BASE = 'https://blog.example.com';

/**
 * root -> alpha, page/2, off-site link, excluded draft
 * alpha -> beta (same content as alpha)
 * page/2 -> gamma (missing, 404), alpha (already known)
 */
const SITE: Record<string, string> = {
  [`${BASE}/`]: listingPage([
    '/posts/alpha/',
    '/posts/page/2/',
    '/about/',
    'https://other.example.org/posts/elsewhere/',
    '/posts/drafts/wip/',
  ]),
  [`${BASE}/posts/alpha/`]: articlePage('Alpha', 'Alpha body text', ['/posts/beta/']),
  [`${BASE}/posts/page/2/`]: listingPage(['/posts/gamma/', '/posts/alpha/']),
  [`${BASE}/posts/beta/`]: articlePage('Alpha', 'Alpha body text'),
};

function crawlConfigInput(outputFile: string, maxDepth: number): CrawlConfigInput {
  return {
    target: {
      baseUrl: BASE,
      startUrls: [`${BASE}/`],
      allowedDomains: ['blog.example.com'],
      excludePatterns: ['/posts/drafts/*'],
    },
    crawler: {
      parallelJobs: 1,
      requestDelay: 0,
      timeout: '5s',
      maxDepth,
      userAgent: 'TestBot/1.0',
      respectRobotsTxt: false,
    },
    selectors: { article: { title: ['h1'], content: ['article'] } },
    storage: { outputFile, fsync: false },
  };
}

describe('CrawlOrchestrator', () => {
  let dir: string;
  let outputFile: string;
  let store: ArticleStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'orchestrator-test-'));
    outputFile = join(dir, 'articles.jsonl');
    store = await JsonlStore.open({ outputFile, fsync: false });
  });

  afterEach(async () => {
    await store.close();
    await rm(dir, { recursive: true, force: true });
  });

  function setup(maxDepth: number, overrides: Partial<CrawlConfigInput['target']> = {}, evaluateOnly = false) {
    const input = crawlConfigInput(outputFile, maxDepth);
    const crawlConfig = parseCrawlConfig({ ...input, target: { ...input.target, ...overrides } });
    const fetcher = new FakeSiteFetcher(SITE);
    const { orchestrator } = createCrawler(crawlConfig, store, { fetcher, evaluateOnly });
    return { orchestrator, fetcher, crawlConfig };
  }

  it('crawls the site, saving duplicate content once', async () => {
    const { orchestrator, fetcher, crawlConfig } = setup(2);

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls);

    expect(fetcher.requested).toEqual([
      `${BASE}/`,
      `${BASE}/posts/alpha/`,
      `${BASE}/posts/page/2/`,
      `${BASE}/posts/beta/`,
      `${BASE}/posts/gamma/`,
    ]);
    expect(stats).toMatchObject({
      urlsVisited: 5,
      pagesByType: { article: 2, listing: 2, other: 0 },
      articlesExtracted: 2,
      articlesSaved: 1,
      articlesSkipped: 0,
      duplicates: 1,
      fetchErrors: 1,
      writeErrors: 0,
      rejectedUrls: 2,
      evaluateOnly: false,
    });
    expect(stats.finishedAt).not.toBeNull();

    const saved = await store.loadAll();
    expect(saved.map((article) => article.url)).toEqual([`${BASE}/posts/alpha/`]);
  });

  it('records the final state of every frontier entry', async () => {
    const { orchestrator, crawlConfig } = setup(2);

    await orchestrator.crawl(crawlConfig.target.startUrls);

    expect(orchestrator.frontier.get(`${BASE}/posts/alpha/`)).toMatchObject({ depth: 1, state: 'extracted' });
    expect(orchestrator.frontier.get(`${BASE}/posts/beta/`)).toMatchObject({
      depth: 2,
      state: 'extracted',
      discoveredFrom: `${BASE}/posts/alpha/`,
    });
    expect(orchestrator.frontier.get(`${BASE}/posts/gamma/`)?.state).toBe('failed');
    expect(orchestrator.frontier.get(`${BASE}/`)?.state).toBe('skipped');
    expect(orchestrator.frontier.has(`${BASE}/posts/drafts/wip/`)).toBe(false);
  });

  it('never enqueues past the maximum depth', async () => {
    const { orchestrator, fetcher, crawlConfig } = setup(1);

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls);

    expect(fetcher.requested).toEqual([`${BASE}/`, `${BASE}/posts/alpha/`, `${BASE}/posts/page/2/`]);
    expect(stats.articlesSaved).toBe(1);
    expect(stats.duplicates).toBe(0);
  });

  it('visits only the start URLs at depth zero', async () => {
    const { orchestrator, fetcher, crawlConfig } = setup(0);

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls);

    expect(fetcher.requested).toEqual([`${BASE}/`]);
    expect(stats.rejectedUrls).toBe(0);
  });

  it('puts start URLs through the scope gate', async () => {
    const { orchestrator, fetcher } = setup(0);

    const stats = await orchestrator.crawl(['https://other.example.org/', `${BASE}/posts/drafts/wip/`, `${BASE}/`]);

    expect(fetcher.requested).toEqual([`${BASE}/`]);
    expect(stats.rejectedUrls).toBe(2);
  });

  it('writes nothing in evaluate-only mode but still counts duplicates', async () => {
    const { orchestrator, crawlConfig } = setup(2, {}, true);

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls);

    expect(stats).toMatchObject({ evaluateOnly: true, articlesSaved: 1, duplicates: 1 });
    expect(await store.loadAll()).toEqual([]);
  });

  it('consults the store in evaluate-only mode', async () => {
    await setup(2).orchestrator.crawl([`${BASE}/`]);

    const { orchestrator } = setup(2, {}, true);
    const stats = await orchestrator.crawl([`${BASE}/`]);

    expect(stats).toMatchObject({ articlesSaved: 0, duplicates: 2 });
  });

  it('does not fetch anything once cancelled', async () => {
    const { orchestrator, fetcher, crawlConfig } = setup(2);
    const controller = new AbortController();
    controller.abort();

    const stats = await orchestrator.crawl(crawlConfig.target.startUrls, controller.signal);

    expect(fetcher.requested).toEqual([]);
    expect(stats.urlsVisited).toBe(0);
  });
});
