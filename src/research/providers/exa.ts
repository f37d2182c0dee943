/**
 * Exa provider
 *
 * Neural search complementing Tavily's keyword search. Results come with page
 * text (`contents.text`), so hits usually need no page fetch.
 *
 * @see https://docs.exa.ai/reference/how-exa-search-works
 */

import { RESEARCH_CONFIG } from '../../pipeline/config';
import { PipelineError } from '../../pipeline/types';
import { clampInt, isRecord, readJson, safeString, timedFetch } from './http';
import type { SearchHit, SearchProvider } from './types';

const EXA_API_BASE_URL = 'https://api.exa.ai';

// Results (pricing: 1-25 = $5/1k, 26-100 = $25/1k)
const MIN_RESULTS = 1;
const MAX_RESULTS = 25;

const DEFAULT_TEXT_MAX_CHARS = 2000;

export type ExaSearchType = 'auto' | 'neural' | 'keyword' | 'fast';

export interface ExaProviderOptions {
  /** Defaults to EXA_API_KEY, read at call time */
  readonly apiKey?: string;
  readonly type?: ExaSearchType;
  readonly textMaxCharacters?: number;
  readonly timeoutMs?: number;
}

export function parseExaResponse(raw: unknown): SearchHit[] {
  if (!isRecord(raw) || !Array.isArray(raw.results)) {
    throw new PipelineError('MALFORMED_PAYLOAD', 'exa response has no results array');
  }

  const hits: SearchHit[] = [];
  for (const entry of raw.results) {
    if (!isRecord(entry)) continue;
    const url = safeString(entry.url);
    if (!url) continue;
    const title = safeString(entry.title);
    // Content can come from 'text', summary is a separate AI-generated field
    const content = safeString(entry.text) ?? safeString(entry.summary);
    hits.push({
      url,
      ...(title ? { title } : {}),
      ...(content ? { content } : {}),
    });
  }
  return hits;
}

export function createExaProvider(options: ExaProviderOptions = {}): SearchProvider {
  const apiKey = (): string | undefined => options.apiKey ?? process.env.EXA_API_KEY;

  return {
    name: 'exa',
    host: 'api.exa.ai',
    isConfigured: () => Boolean(apiKey()),

    async search(request) {
      const key = apiKey();
      const query = request.query.trim();
      if (!key || query.length === 0) return [];

      const body: Record<string, unknown> = {
        query,
        numResults: clampInt(request.maxResults, MIN_RESULTS, MAX_RESULTS),
        type: options.type ?? 'auto',
        contents: {
          text: { maxCharacters: options.textMaxCharacters ?? DEFAULT_TEXT_MAX_CHARS },
        },
        userLocation: request.country.toUpperCase(),
      };
      if (request.kind === 'news') {
        body.category = 'news';
      }
      if (request.includeDomains && request.includeDomains.length > 0) {
        body.includeDomains = [...request.includeDomains];
      }

      const res = await timedFetch(`${EXA_API_BASE_URL}/search`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': key,
        },
        body: JSON.stringify(body),
        timeoutMs: options.timeoutMs ?? RESEARCH_CONFIG.PROVIDER_TIMEOUT_MS,
        context: 'exa',
        ...(request.signal ? { signal: request.signal } : {}),
      });

      return parseExaResponse(await readJson(res, 'exa'));
    },
  };
}
