/**
 * Search Provider Contract
 *
 * Every research backend (API or scraped HTML) implements this interface.
 * Providers throw PipelineError:
 * - PROVIDER_UNAVAILABLE for network errors, timeouts and error statuses
 * - MALFORMED_PAYLOAD when the response cannot be parsed (never retried)
 */

export interface SearchHit {
  readonly url: string;
  readonly title?: string;
  /** Page text or snippet when the provider returns one */
  readonly content?: string;
}

export type SearchKind = 'web' | 'news';

export interface SearchRequest {
  readonly query: string;
  /** ISO 3166 alpha-2, lowercase (e.g. 'us', 'fr') */
  readonly country: string;
  /** ISO 639-1 (e.g. 'en') */
  readonly language: string;
  readonly maxResults: number;
  /** Client identity for providers that fetch as a browser */
  readonly userAgent?: string;
  /** `news` asks for recent news articles (default: web) */
  readonly kind?: SearchKind;
  /** Restrict results to these domains */
  readonly includeDomains?: readonly string[];
  readonly signal?: AbortSignal;
}

export interface SearchProvider {
  readonly name: string;
  /** Host the provider talks to; used as its rate-limit key */
  readonly host: string;
  /** False when the provider lacks credentials and should be skipped */
  isConfigured(): boolean;
  search(request: SearchRequest): Promise<SearchHit[]>;
  /** Image URLs for a query, for providers that support image search */
  searchImages?(request: SearchRequest): Promise<string[]>;
}
