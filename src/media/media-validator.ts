/**
 * Media URL Validation
 *
 * Two checks:
 * - candidate URLs must be safe to hand to the media service (no SSRF targets:
 *   localhost, private and link-local ranges, cloud metadata, non-HTTPS)
 * - processed URLs must live on a trusted domain and have an image extension
 *   (images) or be a video page on a trusted video host (videos) before an
 *   asset is marked validated
 */

import { MEDIA_CONFIG } from '../pipeline/config';
import type { MediaAsset, MediaKind } from '../pipeline/types';
import { hostMatches } from '../research/url-utils';

// ============================================================================
// Types
// ============================================================================

export type MediaCheck = { readonly ok: true } | { readonly ok: false; readonly reason: string };

export interface MediaValidationOptions {
  /** Domains processed images may be served from (subdomains included) */
  readonly trustedDomains: readonly string[];
  readonly allowedExtensions?: readonly string[];
  readonly trustedVideoHosts?: readonly string[];
}

// ============================================================================
// SSRF Checks
// ============================================================================

/**
 * Checks if a hostname is a private/internal IPv4 address.
 */
function privateAddressReason(hostname: string): string | null {
  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (!ipv4Match) return null;

  const a = parseInt(ipv4Match[1], 10);
  const b = parseInt(ipv4Match[2], 10);

  if (a === 10) return 'Private IP range (10.x.x.x)';
  if (a === 172 && b >= 16 && b <= 31) return 'Private IP range (172.16-31.x.x)';
  if (a === 192 && b === 168) return 'Private IP range (192.168.x.x)';
  if (a === 169 && b === 254) return 'Link-local IP range (169.254.x.x)';
  if (a === 127) return 'Loopback IP range (127.x.x.x)';
  if (a === 0) return 'Current network (0.x.x.x)';
  return null;
}

/**
 * Whether a URL may be fetched on our behalf.
 */
export function checkFetchableUrl(url: string): MediaCheck {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { ok: false, reason: 'Invalid URL format' };
  }

  const hostname = parsed.hostname.toLowerCase();
  if (parsed.protocol !== 'https:') {
    return { ok: false, reason: `Protocol not allowed: ${parsed.protocol}` };
  }
  if (hostname === 'localhost' || hostname === '[::1]' || hostname.endsWith('.localhost')) {
    return { ok: false, reason: 'Localhost URLs are not allowed' };
  }
  if (hostname === 'metadata.google.internal') {
    return { ok: false, reason: 'Cloud metadata service access blocked' };
  }
  const privateReason = privateAddressReason(hostname);
  if (privateReason) {
    return { ok: false, reason: privateReason };
  }
  return { ok: true };
}

// ============================================================================
// Trust Checks
// ============================================================================

/**
 * Whether a processed image URL is servable: fetchable, on a trusted domain,
 * with an allowed image extension.
 */
export function checkImageUrl(url: string, options: MediaValidationOptions): MediaCheck {
  const fetchable = checkFetchableUrl(url);
  if (!fetchable.ok) return fetchable;

  const parsed = new URL(url);
  if (!options.trustedDomains.some((domain) => hostMatches(parsed.hostname, domain))) {
    return { ok: false, reason: `Untrusted domain: ${parsed.hostname}` };
  }

  const extensions = options.allowedExtensions ?? MEDIA_CONFIG.ALLOWED_IMAGE_EXTENSIONS;
  const path = parsed.pathname.toLowerCase();
  if (!extensions.some((ext) => path.endsWith(ext))) {
    return { ok: false, reason: `Unsupported image format: ${parsed.pathname}` };
  }
  return { ok: true };
}

/**
 * Whether a video URL is on a trusted video host.
 */
export function checkVideoUrl(url: string, options: Pick<MediaValidationOptions, 'trustedVideoHosts'> = {}): MediaCheck {
  const fetchable = checkFetchableUrl(url);
  if (!fetchable.ok) return fetchable;

  const hosts = options.trustedVideoHosts ?? MEDIA_CONFIG.TRUSTED_VIDEO_HOSTS;
  const { hostname } = new URL(url);
  if (!hosts.some((host) => hostMatches(hostname, host))) {
    return { ok: false, reason: `Untrusted video host: ${hostname}` };
  }
  return { ok: true };
}

/**
 * Builds a MediaAsset, setting `validated` from the matching check.
 */
export function toMediaAsset(
  url: string,
  kind: MediaKind,
  options: MediaValidationOptions,
  extra: { readonly alt?: string; readonly sourceUrl?: string } = {}
): MediaAsset {
  const check = kind === 'image' ? checkImageUrl(url, options) : checkVideoUrl(url, options);
  return {
    url,
    kind,
    validated: check.ok,
    ...(extra.alt ? { alt: extra.alt } : {}),
    ...(extra.sourceUrl ? { sourceUrl: extra.sourceUrl } : {}),
  };
}
