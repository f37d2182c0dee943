/**
 * Page Fetcher
 *
 * Downloads a source page and reduces it to readable paragraph text for the
 * draft prompt. Used only for hits whose provider returned no content.
 */

import { JSDOM } from 'jsdom';

import { RESEARCH_CONFIG } from '../pipeline/config';
import { timedFetch } from './providers/http';

export interface PageFetchOptions {
  readonly userAgent: string;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface PageText {
  readonly title: string;
  readonly text: string;
}

export type PageFetcher = (url: string, options: PageFetchOptions) => Promise<PageText>;

/** Elements whose text is navigation or chrome, not article body */
const NOISE_SELECTORS = 'script, style, noscript, nav, header, footer, aside, form, iframe';

/**
 * Paragraph text of an HTML page: every <p> of at least `minParagraphChars`,
 * in document order, truncated to `maxChars`.
 */
export function extractPageText(
  html: string,
  minParagraphChars: number = RESEARCH_CONFIG.MIN_PARAGRAPH_CHARS,
  maxChars: number = RESEARCH_CONFIG.MAX_SNIPPET_CHARS
): PageText {
  const { document } = new JSDOM(html).window;
  for (const node of Array.from(document.querySelectorAll(NOISE_SELECTORS))) {
    node.remove();
  }

  const paragraphs: string[] = [];
  for (const p of Array.from(document.querySelectorAll('p'))) {
    const text = (p.textContent ?? '').replace(/\s+/g, ' ').trim();
    if (text.length >= minParagraphChars) {
      paragraphs.push(text);
    }
  }

  const joined = paragraphs.join('\n\n');
  return {
    title: document.title.trim(),
    text: joined.length > maxChars ? joined.slice(0, maxChars) : joined,
  };
}

/**
 * Default fetcher. Non-HTML responses yield empty text rather than an error.
 */
export const fetchPageText: PageFetcher = async (url, options) => {
  const res = await timedFetch(url, {
    method: 'GET',
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'text/html,application/xhtml+xml',
    },
    timeoutMs: options.timeoutMs ?? RESEARCH_CONFIG.PAGE_TIMEOUT_MS,
    context: `page ${url}`,
    ...(options.signal ? { signal: options.signal } : {}),
  });

  const contentType = res.headers.get('content-type') ?? '';
  if (!contentType.includes('html')) {
    return { title: '', text: '' };
  }
  return extractPageText(await res.text());
};
