/**
 * Research Collector
 *
 * Queries search providers in a fixed priority order and returns one source
 * snippet per registrable domain. Collection never fails: when every provider
 * comes back empty or broken on every chain attempt, the result is [].
 *
 * Layers, innermost first:
 * 1. per-domain rate limiting (DomainRateLimiter, shared process-wide)
 * 2. per-request retry with exponential backoff + jitter (withRetry)
 * 3. provider fallback: next provider on an empty result or any error
 * 4. whole-chain retry with a fixed delay and a rotated user agent
 */

import { createPrefixedLogger, type Logger } from '../utils/logger';
import { MEDIA_CONFIG, RESEARCH_CONFIG, RETRY_CONFIG } from '../pipeline/config';
import { DomainRateLimiter, IdentityRotator } from '../pipeline/concurrency';
import { isRetryableError, sleep as realSleep, withRetry } from '../pipeline/retry';
import { errorMessage, type SleepFn, type Snippet } from '../pipeline/types';
import { fetchPageText, type PageFetcher } from './page-fetcher';
import type { SearchHit, SearchKind, SearchProvider, SearchRequest } from './providers/types';
import {
  dedupeByRegistrableDomain,
  extractDomain,
  hostMatches,
  isBlockedUrl,
  normalizeUrl,
  registrableDomain,
} from './url-utils';

// ============================================================================
// Types
// ============================================================================

export interface CollectRequest {
  readonly topic: string;
  readonly language: string;
  readonly country: string;
  readonly maxResults?: number;
  /** Search news articles instead of the open web (collect only) */
  readonly kind?: SearchKind;
  readonly signal?: AbortSignal;
}

export interface ResearchCollectorDeps {
  /** Providers in priority order */
  readonly providers: readonly SearchProvider[];
  readonly rateLimiter?: DomainRateLimiter;
  readonly identities?: IdentityRotator;
  readonly fetchPage?: PageFetcher;
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
}

export interface ResearchCollectorOptions {
  /** M: whole-chain attempts (default: 2) */
  readonly chainAttempts?: number;
  /** Fixed delay between chain attempts (default: 10s) */
  readonly chainDelayMs?: number;
  /** Retries per provider call after the first (default: 2) */
  readonly requestRetries?: number;
  readonly requestInitialDelayMs?: number;
  readonly requestMaxDelayMs?: number;
  readonly maxSnippetChars?: number;
  readonly blockedDomains?: readonly string[];
  readonly blockedExtensions?: readonly string[];
}

const IDENTITY_KEY = 'research';

// ============================================================================
// Collector
// ============================================================================

export class ResearchCollector {
  private readonly log: Logger;
  private readonly rateLimiter: DomainRateLimiter;
  private readonly identities: IdentityRotator;
  private readonly fetchPage: PageFetcher;
  private readonly sleep: SleepFn;

  constructor(
    private readonly deps: ResearchCollectorDeps,
    private readonly options: ResearchCollectorOptions = {}
  ) {
    this.log = deps.logger ?? createPrefixedLogger('[Research]');
    this.rateLimiter =
      deps.rateLimiter ?? new DomainRateLimiter({ intervalMs: RESEARCH_CONFIG.DOMAIN_INTERVAL_MS });
    this.identities = deps.identities ?? new IdentityRotator(RESEARCH_CONFIG.USER_AGENTS);
    this.fetchPage = deps.fetchPage ?? fetchPageText;
    this.sleep = deps.sleep ?? realSleep;
  }

  /**
   * Source snippets for a topic, at most one per registrable domain,
   * in discovery order.
   */
  async collect(request: CollectRequest): Promise<Snippet[]> {
    const maxResults = request.maxResults ?? RESEARCH_CONFIG.MAX_RESULTS;

    const label = request.kind === 'news' ? 'news' : 'collect';

    return this.runChain(label, async (provider, userAgent) => {
      const hits = await this.callProvider(provider, (signal) =>
        provider.search({
          ...this.buildRequest(request.topic, request, maxResults, userAgent, signal),
          ...(request.kind ? { kind: request.kind } : {}),
        }),
        request.signal
      );

      const allowed = hits.filter(
        (hit) =>
          !isBlockedUrl(hit.url, {
            ...(this.options.blockedDomains ? { domains: this.options.blockedDomains } : {}),
            ...(this.options.blockedExtensions ? { extensions: this.options.blockedExtensions } : {}),
          })
      );
      const unique = dedupeByRegistrableDomain(allowed, (hit) => hit.url).slice(0, maxResults);
      if (unique.length < hits.length) {
        this.log.debug(`${provider.name}: kept ${unique.length}/${hits.length} hits after blocklist and dedup`);
      }

      const snippets = await Promise.all(
        unique.map((hit) => this.toSnippet(hit, provider.name, userAgent, request.signal))
      );
      return snippets.filter((snippet): snippet is Snippet => snippet !== null);
    });
  }

  /**
   * Candidate image URLs from the first provider that returns any.
   */
  async findImages(request: CollectRequest): Promise<string[]> {
    const max = request.maxResults ?? MEDIA_CONFIG.MAX_IMAGES * MEDIA_CONFIG.CANDIDATE_MULTIPLIER;

    return this.runChain('images', async (provider, userAgent) => {
      const { searchImages } = provider;
      if (!searchImages) return [];
      const urls = await this.callProvider(provider, (signal) =>
        searchImages.call(provider, this.buildRequest(request.topic, request, max, userAgent, signal)),
        request.signal
      );
      const seen = new Set<string>();
      const kept: string[] = [];
      for (const raw of urls) {
        const url = normalizeUrl(raw);
        if (!url || seen.has(url)) continue;
        seen.add(url);
        kept.push(url);
      }
      return kept.slice(0, max);
    });
  }

  /**
   * First video page for the topic on a trusted video host, or null.
   */
  async findVideo(request: CollectRequest): Promise<string | null> {
    const videos = await this.runChain('video', async (provider, userAgent) => {
      const hits = await this.callProvider(provider, (signal) =>
        provider.search({
          ...this.buildRequest(request.topic, request, 5, userAgent, signal),
          includeDomains: ['youtube.com'],
        }),
        request.signal
      );
      return hits.map((hit) => hit.url).filter(isVideoPageUrl);
    });
    return videos[0] ?? null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private buildRequest(
    query: string,
    request: CollectRequest,
    maxResults: number,
    userAgent: string,
    signal: AbortSignal | undefined
  ): SearchRequest {
    return {
      query,
      country: request.country,
      language: request.language,
      maxResults,
      userAgent,
      ...(signal ? { signal } : {}),
    };
  }

  /**
   * Provider fallback inside a bounded whole-chain retry.
   * Returns the first non-empty result, or [] when everything failed.
   */
  private async runChain<T>(
    label: string,
    perProvider: (provider: SearchProvider, userAgent: string) => Promise<T[]>
  ): Promise<T[]> {
    const attempts = Math.max(1, this.options.chainAttempts ?? RESEARCH_CONFIG.CHAIN_ATTEMPTS);
    const delayMs = this.options.chainDelayMs ?? RESEARCH_CONFIG.CHAIN_DELAY_MS;
    const providers = this.deps.providers.filter((provider) => provider.isConfigured());

    if (providers.length === 0) {
      this.log.warn(`${label}: no configured providers`);
      return [];
    }

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const userAgent =
        attempt === 1 ? this.identities.current(IDENTITY_KEY) : this.identities.rotate(IDENTITY_KEY);

      for (const provider of providers) {
        try {
          const results = await perProvider(provider, userAgent);
          if (results.length > 0) {
            this.log.info(`${label}: ${provider.name} returned ${results.length} result(s)`);
            return results;
          }
          this.log.info(`${label}: ${provider.name} returned nothing, trying next provider`);
        } catch (error) {
          this.log.warn(`${label}: ${provider.name} failed, trying next provider: ${errorMessage(error)}`);
        }
      }

      if (attempt < attempts) {
        this.log.warn(`${label}: all providers failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms`);
        await this.sleep(delayMs);
      }
    }

    this.log.warn(`${label}: giving up after ${attempts} chain attempt(s)`);
    return [];
  }

  private callProvider<T>(
    provider: SearchProvider,
    fn: (signal: AbortSignal | undefined) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return withRetry(() => this.rateLimiter.schedule(provider.host, () => fn(signal)), {
      maxRetries: this.options.requestRetries ?? RETRY_CONFIG.MAX_RETRIES,
      initialDelayMs: this.options.requestInitialDelayMs ?? RETRY_CONFIG.INITIAL_DELAY_MS,
      maxDelayMs: this.options.requestMaxDelayMs ?? RETRY_CONFIG.MAX_DELAY_MS,
      context: `${provider.name} search`,
      shouldRetry: isRetryableError,
      sleep: this.sleep,
      ...(signal ? { signal } : {}),
    });
  }

  private async toSnippet(
    hit: SearchHit,
    provider: string,
    userAgent: string,
    signal: AbortSignal | undefined
  ): Promise<Snippet | null> {
    const maxChars = this.options.maxSnippetChars ?? RESEARCH_CONFIG.MAX_SNIPPET_CHARS;
    let title = hit.title ?? '';
    let content = hit.content ?? '';

    if (!content) {
      try {
        const page = await this.rateLimiter.schedule(extractDomain(hit.url), () =>
          this.fetchPage(hit.url, { userAgent, ...(signal ? { signal } : {}) })
        );
        content = page.text;
        title = title || page.title;
      } catch (error) {
        this.log.debug(`Skipping ${hit.url}: ${errorMessage(error)}`);
        return null;
      }
    }

    if (!content.trim()) return null;

    return {
      url: hit.url,
      domain: registrableDomain(hit.url),
      title: title || extractDomain(hit.url),
      content: content.length > maxChars ? content.slice(0, maxChars) : content,
      provider,
    };
  }
}

/**
 * Whether a URL is a single video page on a trusted video host.
 */
export function isVideoPageUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  const host = parsed.hostname;
  if (!MEDIA_CONFIG.TRUSTED_VIDEO_HOSTS.some((trusted) => hostMatches(host, trusted))) {
    return false;
  }
  if (hostMatches(host, 'youtu.be')) {
    return parsed.pathname.length > 1;
  }
  if (hostMatches(host, 'youtube.com')) {
    return parsed.pathname === '/watch' ? parsed.searchParams.has('v') : parsed.pathname.startsWith('/embed/');
  }
  return /^\/\d+/.test(parsed.pathname);
}
