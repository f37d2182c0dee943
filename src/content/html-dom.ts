/**
 * jsdom helpers for working on HTML fragments.
 */

import { JSDOM } from 'jsdom';

export interface HtmlFragment {
  readonly document: Document;
  /** Container holding the fragment's nodes */
  readonly root: HTMLElement;
  readonly serialize: () => string;
}

/**
 * Parses an HTML fragment into a live DOM. The fragment is placed in `<body>`,
 * so stray `<html>`/`<body>` tags are dropped by the parser.
 */
export function parseFragment(html: string): HtmlFragment {
  const dom = new JSDOM('<!DOCTYPE html><html><head></head><body></body></html>');
  const document = dom.window.document;
  const root = document.body;
  root.innerHTML = html;
  return { document, root, serialize: () => root.innerHTML };
}

/**
 * Elements matching `selector` below `root`, in document order.
 */
export function elementsOf(root: Element, selector: string): Element[] {
  return Array.from(root.querySelectorAll(selector));
}

/**
 * Whether a node is an element (jsdom nodes carry their own constants).
 */
export function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE;
}

/**
 * First child element of `root`, skipping whitespace-only text.
 * Returns null when meaningful text comes first.
 */
export function firstMeaningfulChild(root: Element): Element | null {
  for (const node of Array.from(root.childNodes)) {
    if (isElement(node)) return node;
    if (node.nodeType === node.TEXT_NODE && (node.textContent ?? '').trim().length > 0) return null;
  }
  return null;
}
