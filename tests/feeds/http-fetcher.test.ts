/**
 * Tests for the HTTP feed fetcher
 *
 * Global fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpFeedFetcher } from '../../src/feeds/http-fetcher';
import { FetchFailedError } from '../../src/lib/errors';

const FEED_URL = 'https://x.test/rss';

const RSS_BODY = `<rss version="2.0"><channel><title>Stubbed</title>
<item><guid>s-1</guid><title>Stub item</title><pubDate>Fri, 11 Jul 2025 12:00:00 +0000</pubDate></item>
</channel></rss>`;

function stubFetch(impl: (input: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function fetchError(fetcher: HttpFeedFetcher): Promise<unknown> {
  return fetcher.fetch(FEED_URL).catch((err: unknown) => err);
}

describe('HttpFeedFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should download and parse the feed', async () => {
    stubFetch(async () => new Response(RSS_BODY, { status: 200 }));

    const parsed = await new HttpFeedFetcher().fetch(FEED_URL);

    expect(parsed).toEqual({
      title: 'Stubbed',
      description: undefined,
      entries: [
        {
          guid: 's-1',
          link: undefined,
          title: 'Stub item',
          publishedAt: 1752235200,
          summary: undefined,
        },
      ],
    });
  });

  it('should send the configured user agent', async () => {
    const fetchMock = stubFetch(async () => new Response(RSS_BODY, { status: 200 }));

    await new HttpFeedFetcher({ userAgent: 'test-agent/1.0' }).fetch(FEED_URL);

    expect(fetchMock).toHaveBeenCalledWith(
      FEED_URL,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' }),
      })
    );
  });

  it('should report HTTP error statuses as network failures', async () => {
    stubFetch(async () => new Response('gone', { status: 404 }));

    const error = await fetchError(new HttpFeedFetcher());

    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error).toMatchObject({
      kind: 'network',
      message: `fetch failed (network): HTTP 404 from ${FEED_URL}`,
    });
  });

  it('should report connection errors as network failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await fetchError(new HttpFeedFetcher());

    expect(error).toMatchObject({ kind: 'network', message: 'fetch failed (network): fetch failed' });
  });

  it('should time out a request that never answers', async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const error = await fetchError(new HttpFeedFetcher({ timeoutMs: 20 }));

    expect(error).toMatchObject({
      kind: 'timeout',
      message: `fetch failed (timeout): No response from ${FEED_URL} within 20ms`,
    });
  });

  it('should report a body that is not a feed as unparseable', async () => {
    stubFetch(async () => new Response('<html><body>Login</body></html>', { status: 200 }));

    const error = await fetchError(new HttpFeedFetcher());

    expect(error).toMatchObject({ kind: 'unparseable' });
  });
});
