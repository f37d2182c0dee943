/**
 * Content Mutator
 *
 * Structural post-processing of generated article HTML. Every step is
 * synchronous, does no I/O and never throws: a failing step logs and hands
 * back its input unchanged.
 *
 * Full chain (see `mutate`):
 *   sanitize → rebalance → headings → drop title heading → media → links → backlinks → rebalance
 */

import { createPrefixedLogger, type Logger } from '../utils/logger';
import { MEDIA_CONFIG, MUTATION_CONFIG } from '../pipeline/config';
import { errorMessage, type Draft, type MediaAsset } from '../pipeline/types';
import { hostMatches, registrableDomain } from '../research/url-utils';
import { backlinkSlots, phrasesFor, selectBacklinks } from './backlinks';
import { elementsOf, firstMeaningfulChild, parseFragment, type HtmlFragment } from './html-dom';
import {
  countWords,
  isTagBalanced,
  repairTagBalance,
  stripCodeFences,
  tokenizeHtml,
  visibleText,
} from './markup-utils';
import {
  DEFAULT_PLACEMENT_PLAN,
  describeRule,
  HEADING_SELECTOR,
  insertAt,
  resolvePlacement,
  type MediaPlacement,
  type MediaPlacementPlan,
} from './media-placement';

// ============================================================================
// Types
// ============================================================================

export interface ContentMutatorDeps {
  readonly logger?: Logger;
}

export interface ContentMutatorOptions {
  /** Host of the site the article is published on; links to it are internal */
  readonly siteHost?: string;
  readonly placements?: MediaPlacementPlan;
  readonly trustedVideoHosts?: readonly string[];
  readonly minExternalLinks?: number;
  readonly maxBacklinks?: number;
  readonly backlinkParagraphInterval?: number;
}

export interface MutationInput {
  readonly images: readonly MediaAsset[];
  readonly video: MediaAsset | null;
  readonly backlinkCandidates: readonly string[];
  readonly language: string;
}

export interface MutationResult {
  readonly html: string;
  readonly wordCount: number;
}

const REMOVED_ELEMENTS = 'script, style, noscript, object, embed, form, link, meta, base';

// ============================================================================
// Helpers
// ============================================================================

function isExternalHref(href: string, siteHost: string | undefined): boolean {
  let url: URL;
  try {
    url = new URL(href);
  } catch {
    // Relative URL
    return false;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;
  return !siteHost || !hostMatches(url.hostname, siteHost);
}

/**
 * Embed URL for a video page. YouTube watch and short links become
 * `/embed/<id>`, Vimeo pages become player URLs; anything else is kept.
 *
 * @example
 * toEmbedUrl('https://youtu.be/abc123') // 'https://www.youtube.com/embed/abc123'
 */
export function toEmbedUrl(videoUrl: string): string {
  let url: URL;
  try {
    url = new URL(videoUrl);
  } catch {
    return videoUrl;
  }
  const host = url.hostname.toLowerCase().replace(/^(www|m)\./, '');

  let youtubeId: string | null = null;
  if (host === 'youtu.be') {
    youtubeId = url.pathname.slice(1).split('/')[0] || null;
  } else if (hostMatches(host, 'youtube.com')) {
    if (url.pathname.startsWith('/embed/')) return videoUrl;
    if (url.pathname === '/watch') youtubeId = url.searchParams.get('v');
    else if (url.pathname.startsWith('/shorts/')) youtubeId = url.pathname.split('/')[2] || null;
  } else if (hostMatches(host, 'vimeo.com')) {
    const match = url.pathname.match(/^\/(\d+)/);
    if (match && host !== 'player.vimeo.com') return `https://player.vimeo.com/video/${match[1]}`;
  }

  return youtubeId ? `https://www.youtube.com/embed/${youtubeId}` : videoUrl;
}

function containsUrl(html: string, url: string): boolean {
  return html.includes(url) || html.includes(url.replace(/&/g, '&amp;'));
}

/**
 * Wraps non-whitespace text sitting directly at the top level in a container div.
 */
function wrapBareText(html: string): string {
  let depth = 0;
  let changed = false;
  const out: string[] = [];

  for (const token of tokenizeHtml(html)) {
    if (token.kind === 'open') depth++;
    else if (token.kind === 'close') depth = Math.max(0, depth - 1);

    if (token.kind === 'text' && depth === 0 && token.raw.trim().length > 0) {
      out.push(`<div class="${MUTATION_CONFIG.CONTAINER_CLASS}">${token.raw.trim().replace(/</g, '&lt;')}</div>`);
      changed = true;
      continue;
    }
    out.push(token.raw);
  }
  return changed ? out.join('') : html;
}

// ============================================================================
// Content Mutator
// ============================================================================

export class ContentMutator {
  private readonly log: Logger;

  constructor(
    deps: ContentMutatorDeps = {},
    private readonly options: ContentMutatorOptions = {}
  ) {
    this.log = deps.logger ?? createPrefixedLogger('[Mutator]');
  }

  /**
   * Runs the whole chain and recomputes the word count. Never throws.
   */
  mutate(draft: Pick<Draft, 'title' | 'bodyHtml'>, input: MutationInput): MutationResult {
    let html = this.sanitize(draft.bodyHtml);
    html = this.rebalance(html);
    html = this.applyHeadingHierarchy(html);
    html = this.removeLeadingTitleHeading(html, draft.title);
    html = this.injectMedia(html, input.images, input.video);
    html = this.applyLinkPolicy(html);
    html = this.insertBacklinks(html, input.backlinkCandidates, input.language);
    html = this.rebalance(html);

    const wordCount = countWords(html);
    this.log.info(`Mutation complete: ${wordCount} words`);
    return { html, wordCount };
  }

  /**
   * Removes disallowed elements, comments and unsafe attributes.
   * Re-applying it to its own output changes nothing.
   */
  sanitize(html: string): string {
    return this.step('sanitize', html, (input) => {
      const cleaned = stripCodeFences(input).replace(/<!DOCTYPE[^>]*>/gi, '');
      const fragment = parseFragment(cleaned);
      const { root } = fragment;

      for (const el of elementsOf(root, REMOVED_ELEMENTS)) el.remove();

      const videoHosts = this.options.trustedVideoHosts ?? MEDIA_CONFIG.TRUSTED_VIDEO_HOSTS;
      for (const iframe of elementsOf(root, 'iframe')) {
        const src = iframe.getAttribute('src') ?? '';
        let host = '';
        try {
          host = new URL(src).hostname;
        } catch {
          host = '';
        }
        if (!host || !videoHosts.some((trusted) => hostMatches(host, trusted))) {
          iframe.remove();
        }
      }

      removeComments(root);

      for (const el of elementsOf(root, '*')) {
        for (const attr of Array.from(el.attributes)) {
          const name = attr.name.toLowerCase();
          const scriptUrl = (name === 'href' || name === 'src') && /^\s*javascript:/i.test(attr.value);
          if (name === 'style' || name === 'id' || name.startsWith('on') || scriptUrl) {
            el.removeAttribute(attr.name);
          }
        }
      }

      return fragment.serialize();
    });
  }

  /**
   * Restores tag balance, then wraps bare top-level text.
   * Primary repair re-serializes through jsdom; the token-level repair is the
   * fallback. Both are checked with the same stack scan.
   */
  rebalance(html: string): string {
    return this.step('rebalance', html, (input) => {
      let balanced = input;
      if (!isTagBalanced(input)) {
        const reparsed = parseFragment(input).serialize();
        if (isTagBalanced(reparsed)) {
          balanced = reparsed;
        } else {
          this.log.warn('Parser output still unbalanced, using token repair');
          balanced = repairTagBalance(input);
        }
      }
      return wrapBareText(balanced);
    });
  }

  /**
   * h1 becomes h2; a heading more than one level below the previous one is
   * raised to previous + 1. Attributes and children are kept.
   */
  applyHeadingHierarchy(html: string): string {
    return this.step('headings', html, (input) => {
      const fragment = parseFragment(input);
      let previous = 1;
      let changed = false;

      for (const heading of elementsOf(fragment.root, HEADING_SELECTOR)) {
        const level = Number(heading.tagName.slice(1));
        const target = Math.max(2, Math.min(level, previous + 1));
        previous = target;
        if (target === level) continue;

        const replacement = fragment.document.createElement(`h${target}`);
        for (const attr of Array.from(heading.attributes)) {
          replacement.setAttribute(attr.name, attr.value);
        }
        while (heading.firstChild) replacement.appendChild(heading.firstChild);
        heading.replaceWith(replacement);
        changed = true;
      }
      return changed ? fragment.serialize() : input;
    });
  }

  /**
   * Drops a leading heading that repeats the article title (the CMS renders the title itself).
   */
  removeLeadingTitleHeading(html: string, title: string): string {
    return this.step('title-heading', html, (input) => {
      const fragment = parseFragment(input);
      const first = firstMeaningfulChild(fragment.root);
      if (!first || !first.matches(HEADING_SELECTOR)) return input;

      const normalize = (value: string): string => value.replace(/\s+/g, ' ').trim().toLowerCase();
      if (normalize(first.textContent ?? '') !== normalize(title)) return input;

      first.remove();
      return fragment.serialize();
    });
  }

  /**
   * Inserts validated images and the video at their planned positions.
   * Unvalidated media and media already present are skipped; an insertion
   * that breaks tag balance is reverted.
   */
  injectMedia(
    html: string,
    images: readonly MediaAsset[],
    video: MediaAsset | null,
    plan: MediaPlacementPlan = this.options.placements ?? DEFAULT_PLACEMENT_PLAN
  ): string {
    return this.step('media', html, (input) => {
      const fragment = parseFragment(input);

      images.forEach((image, index) => {
        const placement = plan.images[index];
        if (!placement) {
          this.log.debug(`No placement for image ${index + 1}, skipping ${image.url}`);
          return;
        }
        this.place(fragment, image, placement, () => this.imageFigure(fragment.document, image));
      });

      if (video) {
        this.place(fragment, video, plan.video, () => this.videoFigure(fragment.document, video));
      }

      return fragment.serialize();
    });
  }

  /**
   * External links open in a new tab with nofollow/noopener/noreferrer
   * merged into any existing rel tokens.
   */
  applyLinkPolicy(html: string): string {
    return this.step('links', html, (input) => {
      const fragment = parseFragment(input);
      let changed = false;

      for (const anchor of elementsOf(fragment.root, 'a[href]')) {
        if (!isExternalHref(anchor.getAttribute('href') ?? '', this.options.siteHost)) continue;

        const rel = (anchor.getAttribute('rel') ?? '').split(/\s+/).filter(Boolean);
        for (const token of MUTATION_CONFIG.EXTERNAL_REL_TOKENS) {
          if (!rel.includes(token)) rel.push(token);
        }
        anchor.setAttribute('target', '_blank');
        anchor.setAttribute('rel', rel.join(' '));
        changed = true;
      }
      return changed ? fragment.serialize() : input;
    });
  }

  /**
   * Adds reference sentences linking to candidate URLs when the document has
   * fewer external links than the minimum. Candidates whose domain already
   * appears in a link or in the text are skipped.
   */
  insertBacklinks(html: string, candidates: readonly string[], language: string): string {
    return this.step('backlinks', html, (input) => {
      const minLinks = this.options.minExternalLinks ?? MUTATION_CONFIG.MIN_EXTERNAL_LINKS;
      const maxBacklinks = this.options.maxBacklinks ?? MUTATION_CONFIG.MAX_BACKLINKS;
      const interval = this.options.backlinkParagraphInterval ?? MUTATION_CONFIG.BACKLINK_PARAGRAPH_INTERVAL;

      const fragment = parseFragment(input);
      const hrefs = elementsOf(fragment.root, 'a[href]').map((a) => a.getAttribute('href') ?? '');
      const externalCount = hrefs.filter((href) => isExternalHref(href, this.options.siteHost)).length;
      if (externalCount >= minLinks || candidates.length === 0) return input;

      const presentDomains = new Set(hrefs.map((href) => registrableDomain(href)).filter(Boolean));
      const text = visibleText(input).toLowerCase();
      const chosen = selectBacklinks(candidates, presentDomains, text, maxBacklinks);
      if (chosen.length === 0) return input;

      const paragraphs = elementsOf(fragment.root, 'p');
      const slots = backlinkSlots(paragraphs.length, interval, chosen.length);
      if (slots.length === 0) return input;

      const phrases = phrasesFor(language);
      const { document } = fragment;
      slots.forEach((slot, i) => {
        const link = chosen[i];
        const anchorParagraph = paragraphs[slot];
        if (!link || !anchorParagraph) return;

        const sentence = document.createElement('p');
        const anchor = document.createElement('a');
        anchor.setAttribute('href', link.url);
        anchor.setAttribute('target', '_blank');
        anchor.setAttribute('rel', MUTATION_CONFIG.EXTERNAL_REL_TOKENS.join(' '));
        anchor.textContent = link.domain;
        sentence.append(`${phrases[i % phrases.length] ?? ''} `, anchor, '.');
        anchorParagraph.after(sentence);
      });

      this.log.info(`Inserted ${Math.min(slots.length, chosen.length)} backlink(s)`);
      return fragment.serialize();
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private step(name: string, input: string, fn: (html: string) => string): string {
    try {
      return fn(input);
    } catch (error) {
      this.log.warn(`Step "${name}" failed, keeping its input: ${errorMessage(error)}`);
      return input;
    }
  }

  private place(fragment: HtmlFragment, asset: MediaAsset, placement: MediaPlacement, build: () => Element): void {
    if (!asset.validated) {
      this.log.warn(`Skipping unvalidated ${asset.kind}: ${asset.url}`);
      return;
    }

    const before = fragment.serialize();
    const markerUrl = asset.kind === 'video' ? toEmbedUrl(asset.url) : asset.url;
    if (containsUrl(before, asset.url) || containsUrl(before, markerUrl)) {
      this.log.debug(`Skipping ${asset.kind} already present: ${asset.url}`);
      return;
    }

    const point = resolvePlacement(fragment.root, placement);
    if (!point) {
      this.log.info(`No position for ${asset.kind} (${describeRule(placement.rule)}), skipping`);
      return;
    }

    insertAt(fragment.root, point, build());
    if (!isTagBalanced(fragment.serialize())) {
      fragment.root.innerHTML = before;
      this.log.warn(`Reverted ${asset.kind} insertion at ${describeRule(placement.rule)}: unbalanced result`);
    }
  }

  private imageFigure(document: Document, image: MediaAsset): Element {
    const figure = document.createElement('figure');
    figure.setAttribute('class', MUTATION_CONFIG.IMAGE_CLASS);
    const img = document.createElement('img');
    img.setAttribute('src', image.url);
    img.setAttribute('alt', image.alt ?? '');
    img.setAttribute('loading', 'lazy');
    figure.append(img);
    return figure;
  }

  private videoFigure(document: Document, video: MediaAsset): Element {
    const figure = document.createElement('figure');
    figure.setAttribute('class', MUTATION_CONFIG.VIDEO_CLASS);
    const iframe = document.createElement('iframe');
    iframe.setAttribute('src', toEmbedUrl(video.url));
    iframe.setAttribute('title', video.alt ?? 'Video');
    iframe.setAttribute('loading', 'lazy');
    iframe.setAttribute('allowfullscreen', '');
    figure.append(iframe);
    return figure;
  }
}

function removeComments(node: Node): void {
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeType === child.COMMENT_NODE) {
      child.remove();
    } else {
      removeComments(child);
    }
  }
}
