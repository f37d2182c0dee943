/**
 * Research collector against the provider HTTP APIs.
 * Uses the global MSW server from tests/setup.ts; handlers are overridden per test.
 */

import { describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';

import { ResearchCollector, isVideoPageUrl } from '../../../src/research/collector';
import { createDuckDuckGoProvider } from '../../../src/research/providers/duckduckgo';
import { createExaProvider } from '../../../src/research/providers/exa';
import { createTavilyProvider } from '../../../src/research/providers/tavily';
import type { PageFetcher } from '../../../src/research/page-fetcher';
import { DomainRateLimiter } from '../../../src/pipeline/concurrency';
import { silentLogger } from '../../../src/utils/logger';
import { server } from '../../mocks/server';

const REQUEST = { topic: 'pour-over coffee', language: 'en', country: 'us' };

function setup(fetchPage: PageFetcher = vi.fn<PageFetcher>().mockResolvedValue({ title: '', text: '' })) {
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});
  const collector = new ResearchCollector(
    {
      providers: [createTavilyProvider(), createExaProvider(), createDuckDuckGoProvider()],
      rateLimiter: new DomainRateLimiter({ intervalMs: 0 }),
      fetchPage,
      sleep,
      logger: silentLogger,
    },
    { chainAttempts: 2, chainDelayMs: 10_000, requestRetries: 0 }
  );
  return { collector, sleep };
}

describe('ResearchCollector.collect', () => {
  it('returns snippets from the first provider with results', async () => {
    const { collector } = setup();

    const snippets = await collector.collect(REQUEST);

    expect(snippets).toEqual([
      {
        url: 'https://coffee-notes.example.com/ratios',
        domain: 'example.com',
        title: 'Brewing ratios explained',
        content: 'A 1:16 coffee to water ratio is a common starting point for filter brewing.',
        provider: 'tavily',
      },
      {
        url: 'https://grindlab.example.org/guide',
        domain: 'example.org',
        title: 'Grind size guide',
        content: 'Finer grinds extract faster; adjust grind before changing the dose.',
        provider: 'tavily',
      },
    ]);
  });

  it('returns [] after every provider comes back empty on every chain attempt', async () => {
    let tavilyCalls = 0;
    server.use(
      http.post('https://api.tavily.com/search', () => {
        tavilyCalls++;
        return HttpResponse.json({ results: [] });
      }),
      http.post('https://api.exa.ai/search', () => HttpResponse.json({ results: [] })),
      http.get('https://html.duckduckgo.com/html/', () => new HttpResponse('<html><body></body></html>'))
    );
    const { collector, sleep } = setup();

    await expect(collector.collect(REQUEST)).resolves.toEqual([]);
    expect(tavilyCalls).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10_000);
  });

  it('falls back to the next provider when one fails', async () => {
    server.use(http.post('https://api.tavily.com/search', () => new HttpResponse(null, { status: 503 })));
    const { collector } = setup();

    const snippets = await collector.collect(REQUEST);

    expect(snippets.map((s) => [s.provider, s.url])).toEqual([
      ['exa', 'https://brewscience.example.com/temperature'],
    ]);
  });

  it('drops blocked urls, keeps one hit per registrable domain and fetches missing content', async () => {
    server.use(
      http.post('https://api.tavily.com/search', () =>
        HttpResponse.json({
          results: [
            { url: 'https://a.example.com/1', title: 'A', content: 'first' },
            { url: 'https://b.example.com/2', title: 'B', content: 'second' },
            { url: 'https://www.youtube.com/watch?v=1', title: 'Video', content: 'video' },
            { url: 'https://docs.brewing.net/manual.pdf', title: 'PDF', content: 'pdf' },
            { url: 'https://brewing.net/page', content: '' },
          ],
        })
      )
    );
    const fetchPage = vi.fn<PageFetcher>().mockResolvedValue({ title: 'Brewing page', text: 'Fetched body' });
    const { collector } = setup(fetchPage);

    const snippets = await collector.collect(REQUEST);

    expect(snippets.map((s) => [s.url, s.title, s.content])).toEqual([
      ['https://a.example.com/1', 'A', 'first'],
      ['https://brewing.net/page', 'Brewing page', 'Fetched body'],
    ]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage.mock.calls[0][0]).toBe('https://brewing.net/page');
  });
});

describe('ResearchCollector news collection', () => {
  it('asks the provider for news and keeps the headline order', async () => {
    let body: unknown;
    server.use(
      http.post('https://api.tavily.com/search', async ({ request }) => {
        body = await request.json();
        return HttpResponse.json({
          results: [
            { url: 'https://daily.example.com/markets', title: 'Markets rally', content: 'Stocks rose.' },
            { url: 'https://wire.example.org/rates', title: 'Rates on hold', content: 'The bank paused.' },
          ],
        });
      })
    );
    const { collector } = setup();

    const snippets = await collector.collect({ ...REQUEST, topic: 'business', kind: 'news' });

    expect(body).toMatchObject({ query: 'business', topic: 'news' });
    expect(snippets.map((s) => s.title)).toEqual(['Markets rally', 'Rates on hold']);
  });
});

describe('ResearchCollector media lookups', () => {
  it('returns image candidates from tavily', async () => {
    const { collector } = setup();
    await expect(collector.findImages({ ...REQUEST, maxResults: 6 })).resolves.toEqual([
      'https://images.example.net/beans.jpg',
      'https://images.example.net/kettle.png',
    ]);
  });

  it('returns the first video page from a restricted search', async () => {
    server.use(
      http.post('https://api.tavily.com/search', () =>
        HttpResponse.json({
          results: [
            { url: 'https://www.youtube.com/@channel', content: 'channel' },
            { url: 'https://www.youtube.com/watch?v=abc123', content: 'video' },
          ],
        })
      )
    );
    const { collector } = setup();

    await expect(collector.findVideo(REQUEST)).resolves.toBe('https://www.youtube.com/watch?v=abc123');
  });
});

describe('isVideoPageUrl', () => {
  it('accepts single video pages on trusted hosts only', () => {
    expect(isVideoPageUrl('https://youtu.be/abc')).toBe(true);
    expect(isVideoPageUrl('https://www.youtube.com/watch?v=abc')).toBe(true);
    expect(isVideoPageUrl('https://www.youtube.com/results?search_query=x')).toBe(false);
    expect(isVideoPageUrl('https://video.example.com/watch?v=abc')).toBe(false);
  });
});
