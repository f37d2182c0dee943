/**
 * DuckDuckGo HTML provider.
 *
 * Scrapes the no-JavaScript results page, so it needs no API key and is the
 * usual last resort in the chain. Result links are redirect URLs
 * (`//duckduckgo.com/l/?uddg=<target>`) and are unwrapped here.
 */

import { JSDOM } from 'jsdom';

import { RESEARCH_CONFIG } from '../../pipeline/config';
import { PipelineError } from '../../pipeline/types';
import { normalizeUrl } from '../url-utils';
import { timedFetch } from './http';
import type { SearchHit, SearchProvider, SearchRequest } from './types';

const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';

export interface DuckDuckGoProviderOptions {
  readonly timeoutMs?: number;
}

/**
 * Unwraps a DuckDuckGo redirect link to its target URL.
 *
 * @example
 * unwrapResultLink('//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fa&rut=x')
 * // 'https://example.com/a'
 */
export function unwrapResultLink(href: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href, 'https://duckduckgo.com');
  } catch {
    return null;
  }
  if (parsed.hostname.endsWith('duckduckgo.com') && parsed.pathname.startsWith('/l/')) {
    const target = parsed.searchParams.get('uddg');
    return target ? normalizeUrl(target) : null;
  }
  return normalizeUrl(parsed.toString());
}

/**
 * Extracts hits from a results page. A bot-challenge page is reported as a
 * retryable outage so the chain can rotate identity and come back later.
 */
export function parseDuckDuckGoHtml(html: string, maxResults: number): SearchHit[] {
  const { document } = new JSDOM(html).window;

  if (document.querySelector('.anomaly-modal, #challenge-form')) {
    throw new PipelineError('PROVIDER_UNAVAILABLE', 'duckduckgo served a bot challenge');
  }

  const hits: SearchHit[] = [];
  for (const result of Array.from(document.querySelectorAll('.result'))) {
    if (hits.length >= maxResults) break;
    const anchor = result.querySelector('a.result__a');
    const href = anchor?.getAttribute('href');
    if (!anchor || !href) continue;

    const url = unwrapResultLink(href);
    if (!url) continue;

    const title = anchor.textContent?.trim();
    const snippet = result.querySelector('.result__snippet')?.textContent?.trim();
    hits.push({
      url,
      ...(title ? { title } : {}),
      ...(snippet ? { content: snippet } : {}),
    });
  }
  return hits;
}

export function createDuckDuckGoProvider(options: DuckDuckGoProviderOptions = {}): SearchProvider {
  async function fetchResults(request: SearchRequest): Promise<SearchHit[]> {
    if (request.query.trim().length === 0) return [];
    const domainFilter = (request.includeDomains ?? []).map((domain) => `site:${domain}`).join(' OR ');
    const query = [request.query.trim(), domainFilter].filter(Boolean).join(' ');

    const url = new URL(DUCKDUCKGO_HTML_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('kl', `${request.country.toLowerCase()}-${request.language.toLowerCase()}`);
    // No news index on the HTML endpoint; the past-day filter is the closest match
    if (request.kind === 'news') url.searchParams.set('df', 'd');

    const res = await timedFetch(url.toString(), {
      method: 'GET',
      headers: {
        'User-Agent': request.userAgent ?? RESEARCH_CONFIG.USER_AGENTS[0],
        'Accept-Language': request.language,
      },
      timeoutMs: options.timeoutMs ?? RESEARCH_CONFIG.PROVIDER_TIMEOUT_MS,
      context: 'duckduckgo',
      ...(request.signal ? { signal: request.signal } : {}),
    });

    return parseDuckDuckGoHtml(await res.text(), request.maxResults);
  }

  return {
    name: 'duckduckgo',
    host: 'html.duckduckgo.com',
    isConfigured: () => true,
    search: fetchResults,
  };
}
