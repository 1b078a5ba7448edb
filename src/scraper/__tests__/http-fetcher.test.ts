import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpFetcher, type HttpFetcherOptions } from '../http-fetcher.js';

const URL_OK = 'https://blog.example.com/posts/hello/';

function htmlResponse(body: string): Response {
  return new Response(body, {
    status: 200,
    headers: { 'content-type': 'text/html; charset=utf-8' },
  });
}

function createFetcher(overrides: Partial<HttpFetcherOptions> = {}): HttpFetcher {
  return new HttpFetcher({
    userAgent: 'TestBot/1.0',
    timeoutMs: 1000,
    allowedDomains: ['blog.example.com'],
    retry: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1, factor: 1 },
    ...overrides,
  });
}

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and parses an HTML page', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(htmlResponse('<html><body><h1>Hello</h1></body></html>'));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.page.url).toBe(URL_OK);
    expect(result.page.requestedUrl).toBe(URL_OK);
    expect(result.page.statusCode).toBe(200);
    expect(result.page.$('h1').text()).toBe('Hello');
    expect(fetchSpy).toHaveBeenCalledWith(
      URL_OK,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'TestBot/1.0' }),
      })
    );
  });

  it('refuses hosts outside the allowed domains without a request', async () => {
    const fetchSpy = vi.fn();
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse('https://other.example.org/posts/x/');

    expect(result).toEqual({
      ok: false,
      failure: {
        url: 'https://other.example.org/posts/x/',
        reason: 'off_domain',
        message: 'Host is not in the allowed domains',
      },
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('blocks when the robots policy disallows the URL', async () => {
    const fetchSpy = vi.fn();
    vi.stubGlobal('fetch', fetchSpy);
    const robots = {
      isAllowed: vi.fn().mockResolvedValue(false),
      getCrawlDelay: vi.fn().mockResolvedValue(null),
    };

    const result = await createFetcher({ robots }).fetchAndParse(URL_OK);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.reason).toBe('robots_blocked');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('reports client errors without retrying', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: { url: URL_OK, reason: 'http_error', statusCode: 404, message: 'HTTP 404: Not Found' },
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries transient status codes', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(htmlResponse('<p>ok</p>'));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result.ok).toBe(true);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt on a transient status', async () => {
    const fetchSpy = vi
      .fn()
      .mockImplementation(() => Promise.resolve(new Response('down', { status: 500, statusText: 'Server Error' })));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: { url: URL_OK, reason: 'http_error', statusCode: 500, message: 'HTTP 500: Server Error' },
    });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('retries network errors and reports them', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: { url: URL_OK, reason: 'network', message: 'fetch failed' },
    });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors that are not transient', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(new TypeError('Failed to parse URL from blog.example.com'));
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: { url: URL_OK, reason: 'network', message: 'Failed to parse URL from blog.example.com' },
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('times out slow requests', async () => {
    const fetchSpy = vi.fn().mockImplementation(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        })
    );
    vi.stubGlobal('fetch', fetchSpy);

    const result = await createFetcher({
      timeoutMs: 10,
      retry: { maxAttempts: 1 },
    }).fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: { url: URL_OK, reason: 'timeout', message: 'Request timed out after 10ms' },
    });
  });

  it('rejects responses that are not HTML', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('%PDF', { status: 200, headers: { 'content-type': 'application/pdf' } }))
    );

    const result = await createFetcher().fetchAndParse(URL_OK);

    expect(result).toEqual({
      ok: false,
      failure: {
        url: URL_OK,
        reason: 'not_html',
        statusCode: 200,
        message: 'Unsupported content type: application/pdf',
      },
    });
  });
});
