/**
 * URL Utilities
 *
 * URL helpers shared by research, media validation and content mutation.
 */

import { getDomain } from 'tldts';

import { BLOCKED_DOMAINS, BLOCKED_EXTENSIONS } from '../pipeline/config';

/**
 * Extracts the hostname from a URL, removing 'www.' prefix.
 *
 * @returns Hostname without www prefix, or empty string if invalid
 *
 * @example
 * extractDomain('https://www.example.com/path') // 'example.com'
 * extractDomain('https://cdn.example.com/image.jpg') // 'cdn.example.com'
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Registrable domain (domain + public suffix) used as the dedup key.
 * Falls back to the bare hostname for hosts without a public suffix
 * (localhost, IP addresses).
 *
 * @example
 * registrableDomain('https://news.bbc.co.uk/a') // 'bbc.co.uk'
 * registrableDomain('https://blog.example.com/b') // 'example.com'
 */
export function registrableDomain(url: string): string {
  const host = extractDomain(url);
  if (!host) return '';
  return getDomain(host) ?? host;
}

/**
 * Normalizes a URL for deduplication and validation.
 * Removes hash fragments and validates protocol.
 *
 * @returns Normalized URL or null if invalid/non-http(s)
 *
 * @example
 * normalizeUrl('https://example.com/page#section') // 'https://example.com/page'
 * normalizeUrl('ftp://example.com') // null
 */
export function normalizeUrl(url: string): string | null {
  try {
    const u = new URL(url.trim());
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
    u.hash = '';
    return u.toString();
  } catch {
    return null;
  }
}

/**
 * True when `host` equals `domain` or is a subdomain of it.
 *
 * @example
 * hostMatches('cdn.example.com', 'example.com') // true
 * hostMatches('badexample.com', 'example.com') // false
 */
export function hostMatches(host: string, domain: string): boolean {
  const h = host.toLowerCase().replace(/^www\./, '');
  const d = domain.toLowerCase().replace(/^www\./, '');
  return h === d || h.endsWith(`.${d}`);
}

export interface BlocklistOptions {
  readonly domains?: readonly string[];
  readonly extensions?: readonly string[];
}

/**
 * Whether a URL should be skipped before any network fetch:
 * invalid or non-http(s), on a blocked domain, or pointing at a non-HTML file.
 */
export function isBlockedUrl(url: string, options: BlocklistOptions = {}): boolean {
  const normalized = normalizeUrl(url);
  if (!normalized) return true;

  const domains = options.domains ?? BLOCKED_DOMAINS;
  const extensions = options.extensions ?? BLOCKED_EXTENSIONS;

  const parsed = new URL(normalized);
  const host = parsed.hostname;
  if (domains.some((domain) => hostMatches(host, domain))) {
    return true;
  }

  const path = parsed.pathname.toLowerCase();
  return extensions.some((ext) => path.endsWith(ext));
}

/**
 * Keeps the first URL per registrable domain, in discovery order.
 * Invalid URLs are dropped.
 *
 * @example
 * dedupeByRegistrableDomain([
 *   'https://a.example.com/1',
 *   'https://b.example.com/2',
 *   'https://other.org/3',
 * ], (url) => url) // ['https://a.example.com/1', 'https://other.org/3']
 */
export function dedupeByRegistrableDomain<T>(
  items: readonly T[],
  getUrl: (item: T) => string
): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const item of items) {
    const domain = registrableDomain(getUrl(item));
    if (!domain || seen.has(domain)) continue;
    seen.add(domain);
    kept.push(item);
  }
  return kept;
}
