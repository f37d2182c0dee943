/**
 * Tavily Web Search provider.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 *
 * Basic depth (1 credit) is enough for source discovery; `content` carries an
 * extracted snippet, so Tavily hits rarely need a page fetch. With
 * `include_images` the same call returns candidate image URLs.
 */

import { RESEARCH_CONFIG } from '../../pipeline/config';
import { PipelineError } from '../../pipeline/types';
import { clampInt, isRecord, readJson, safeString, timedFetch } from './http';
import type { SearchHit, SearchProvider, SearchRequest } from './types';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

export interface TavilyProviderOptions {
  /** Defaults to TAVILY_API_KEY, read at call time */
  readonly apiKey?: string;
  readonly timeoutMs?: number;
  readonly searchDepth?: 'basic' | 'advanced';
}

interface TavilyParsed {
  readonly hits: SearchHit[];
  readonly images: string[];
}

/**
 * Parses a Tavily search response. Anything that is not an object with a
 * `results` array is a malformed payload.
 */
export function parseTavilyResponse(raw: unknown): TavilyParsed {
  if (!isRecord(raw) || !Array.isArray(raw.results)) {
    throw new PipelineError('MALFORMED_PAYLOAD', 'tavily response has no results array');
  }

  const hits: SearchHit[] = [];
  for (const entry of raw.results) {
    if (!isRecord(entry)) continue;
    const url = safeString(entry.url);
    if (!url) continue;
    const title = safeString(entry.title);
    const content = safeString(entry.content);
    hits.push({
      url,
      ...(title ? { title } : {}),
      ...(content ? { content } : {}),
    });
  }

  // `images` is either string[] or { url, description }[] depending on include_image_descriptions
  const images: string[] = [];
  if (Array.isArray(raw.images)) {
    for (const image of raw.images) {
      const url = isRecord(image) ? safeString(image.url) : safeString(image);
      if (url) images.push(url);
    }
  }

  return { hits, images };
}

export function createTavilyProvider(options: TavilyProviderOptions = {}): SearchProvider {
  const apiKey = (): string | undefined => options.apiKey ?? process.env.TAVILY_API_KEY;

  async function call(request: SearchRequest, includeImages: boolean): Promise<TavilyParsed> {
    const key = apiKey();
    const query = request.query.trim();
    if (!key || query.length === 0) {
      return { hits: [], images: [] };
    }

    const res = await timedFetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${key}`,
      },
      body: JSON.stringify({
        query,
        search_depth: options.searchDepth ?? 'basic',
        max_results: clampInt(request.maxResults, 1, 20), // Tavily allows up to 20
        include_answer: false,
        include_images: includeImages,
        ...(request.kind === 'news' ? { topic: 'news' } : {}),
        ...(request.includeDomains && request.includeDomains.length > 0
          ? { include_domains: [...request.includeDomains] }
          : {}),
      }),
      timeoutMs: options.timeoutMs ?? RESEARCH_CONFIG.PROVIDER_TIMEOUT_MS,
      context: 'tavily',
      ...(request.signal ? { signal: request.signal } : {}),
    });

    return parseTavilyResponse(await readJson(res, 'tavily'));
  }

  return {
    name: 'tavily',
    host: 'api.tavily.com',
    isConfigured: () => Boolean(apiKey()),
    search: async (request) => (await call(request, false)).hits,
    searchImages: async (request) => (await call(request, true)).images,
  };
}
