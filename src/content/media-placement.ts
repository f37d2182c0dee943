/**
 * Media placement rules and the DOM lookup that resolves them.
 */

import { MUTATION_CONFIG } from '../pipeline/config';
import { elementsOf, firstMeaningfulChild } from './html-dom';

// ============================================================================
// Types
// ============================================================================

export type PlacementRule =
  | { readonly kind: 'top' }
  | { readonly kind: 'end' }
  | { readonly kind: 'after-heading'; readonly index: number }
  | { readonly kind: 'after-paragraph'; readonly index: number };

/**
 * What to do when the rule's target does not exist:
 * - last-matching: after the last element of the rule's kind, else top
 * - top / end: fixed position
 * - skip: leave the media out
 */
export type PlacementFallback = 'last-matching' | 'top' | 'end' | 'skip';

export interface MediaPlacement {
  readonly rule: PlacementRule;
  readonly fallback?: PlacementFallback;
}

export interface MediaPlacementPlan {
  /** One entry per image, in order; extra images are not placed */
  readonly images: readonly MediaPlacement[];
  readonly video: MediaPlacement;
}

export const DEFAULT_PLACEMENT_PLAN: MediaPlacementPlan = {
  images: [
    { rule: { kind: MUTATION_CONFIG.FIRST_IMAGE_PLACEMENT } },
    { rule: { kind: 'after-heading', index: MUTATION_CONFIG.SECOND_IMAGE_HEADING_INDEX } },
  ],
  video: { rule: { kind: 'after-heading', index: MUTATION_CONFIG.VIDEO_HEADING_INDEX } },
};

export const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

/**
 * Where to insert: after `anchor`, or as the first/last child of the root.
 */
export type InsertionPoint =
  | { readonly kind: 'after'; readonly anchor: Element }
  | { readonly kind: 'prepend' }
  | { readonly kind: 'append' };

export function describeRule(rule: PlacementRule): string {
  return rule.kind === 'after-heading' || rule.kind === 'after-paragraph' ? `${rule.kind}(${rule.index})` : rule.kind;
}

// ============================================================================
// Resolution
// ============================================================================

function topPoint(root: Element): InsertionPoint {
  const first = firstMeaningfulChild(root);
  if (first && first.matches(HEADING_SELECTOR)) {
    return { kind: 'after', anchor: first };
  }
  return { kind: 'prepend' };
}

function fallbackPoint(root: Element, fallback: PlacementFallback, matches: readonly Element[]): InsertionPoint | null {
  switch (fallback) {
    case 'skip':
      return null;
    case 'top':
      return topPoint(root);
    case 'end':
      return { kind: 'append' };
    case 'last-matching': {
      const last = matches[matches.length - 1];
      return last ? { kind: 'after', anchor: last } : topPoint(root);
    }
  }
}

/**
 * Resolves a placement against the current document.
 * `after-heading(n)` and `after-paragraph(n)` are 1-based in document order.
 *
 * @returns null when the placement resolves to `skip`
 *
 * @example
 * // 5 headings, after-heading(12), default fallback → after heading 5
 */
export function resolvePlacement(root: Element, placement: MediaPlacement): InsertionPoint | null {
  const { rule } = placement;
  const fallback = placement.fallback ?? 'last-matching';

  switch (rule.kind) {
    case 'top':
      return topPoint(root);
    case 'end':
      return { kind: 'append' };
    case 'after-heading':
    case 'after-paragraph': {
      const matches = elementsOf(root, rule.kind === 'after-heading' ? HEADING_SELECTOR : 'p');
      const target = rule.index >= 1 ? matches[rule.index - 1] : undefined;
      return target ? { kind: 'after', anchor: target } : fallbackPoint(root, fallback, matches);
    }
  }
}

export function insertAt(root: Element, point: InsertionPoint, node: Node): void {
  switch (point.kind) {
    case 'after':
      point.anchor.after(node);
      return;
    case 'prepend':
      root.prepend(node);
      return;
    case 'append':
      root.append(node);
      return;
  }
}
