/**
 * Markup Utilities
 *
 * Pure string-level helpers over generated HTML: a small tokenizer, the
 * stack-based tag-balance scan, the regex-level repair used when the DOM
 * parser path cannot be trusted, and visible-text word counting.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Elements that never take a closing tag.
 */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'command',
  'embed',
  'hr',
  'img',
  'input',
  'keygen',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

/** Elements whose content is raw text, skipped by the tokenizer */
const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set([
  'iframe',
  'noembed',
  'noscript',
  'script',
  'style',
  'textarea',
  'title',
  'xmp',
]);

const TOKEN_PATTERN =
  /<!--[\s\S]*?-->|<![^>]*>|<\/?([a-zA-Z][a-zA-Z0-9-]*)(?![a-zA-Z0-9-])(?:[^>"']|"[^"]*"|'[^']*')*>/g;

// ============================================================================
// Tokenizer
// ============================================================================

export type HtmlTokenKind = 'text' | 'open' | 'close' | 'void' | 'comment' | 'declaration';

export interface HtmlToken {
  readonly kind: HtmlTokenKind;
  readonly raw: string;
  /** Lowercased tag name for element tokens */
  readonly name?: string;
}

/**
 * Splits HTML into text, tag, comment and declaration tokens.
 * A `<` that does not start a well-formed tag stays in the text.
 * Raw-text elements (script, style, ...) are emitted with their content as text.
 * A trailing `/` on a non-void tag is ignored, as an HTML parser does: `<div/>` opens.
 */
export function tokenizeHtml(html: string): HtmlToken[] {
  const tokens: HtmlToken[] = [];
  const pattern = new RegExp(TOKEN_PATTERN.source, 'g');
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(html)) !== null) {
    if (match.index > cursor) {
      tokens.push({ kind: 'text', raw: html.slice(cursor, match.index) });
    }
    const raw = match[0];
    cursor = match.index + raw.length;

    if (raw.startsWith('<!--')) {
      tokens.push({ kind: 'comment', raw });
      continue;
    }
    if (raw.startsWith('<!')) {
      tokens.push({ kind: 'declaration', raw });
      continue;
    }

    const name = match[1].toLowerCase();
    if (raw.startsWith('</')) {
      tokens.push({ kind: 'close', raw, name });
      continue;
    }
    if (VOID_ELEMENTS.has(name)) {
      tokens.push({ kind: 'void', raw, name });
      continue;
    }
    tokens.push({ kind: 'open', raw, name });

    if (RAW_TEXT_ELEMENTS.has(name)) {
      const closeIndex = html.toLowerCase().indexOf(`</${name}`, cursor);
      if (closeIndex === -1) {
        // Unterminated raw text runs to the end of the input
        if (cursor < html.length) tokens.push({ kind: 'text', raw: html.slice(cursor) });
        cursor = html.length;
        break;
      }
      if (closeIndex > cursor) tokens.push({ kind: 'text', raw: html.slice(cursor, closeIndex) });
      cursor = closeIndex;
      pattern.lastIndex = closeIndex;
    }
  }

  if (cursor < html.length) {
    tokens.push({ kind: 'text', raw: html.slice(cursor) });
  }
  return tokens;
}

// ============================================================================
// Tag Balance
// ============================================================================

export interface TagBalanceReport {
  readonly balanced: boolean;
  /** Elements still open at the end, outermost first */
  readonly unclosed: readonly string[];
  /** Closing tags that did not match the innermost open element */
  readonly strayClosers: readonly string[];
}

/**
 * Stack-based scan: every closing tag must match the innermost open element
 * and the stack must end empty. Void elements never open.
 */
export function scanTagBalance(html: string): TagBalanceReport {
  const stack: string[] = [];
  const strayClosers: string[] = [];

  for (const token of tokenizeHtml(html)) {
    if (!token.name) continue;
    if (token.kind === 'open') {
      stack.push(token.name);
    } else if (token.kind === 'close') {
      if (stack.length > 0 && stack[stack.length - 1] === token.name) {
        stack.pop();
      } else {
        strayClosers.push(token.name);
      }
    }
  }

  return {
    balanced: stack.length === 0 && strayClosers.length === 0,
    unclosed: stack,
    strayClosers,
  };
}

export function isTagBalanced(html: string): boolean {
  return scanTagBalance(html).balanced;
}

/**
 * Token-level repair, the fallback behind the DOM parser:
 * - a closer for an element that is open closes everything opened after it
 * - a closer for an element that is not open is dropped
 * - whatever is still open at the end is closed in reverse-open order
 *
 * The output always passes `scanTagBalance`.
 */
export function repairTagBalance(html: string): string {
  const out: string[] = [];
  const stack: string[] = [];

  for (const token of tokenizeHtml(html)) {
    if (token.kind === 'open' && token.name) {
      stack.push(token.name);
      out.push(token.raw.replace(/\s*\/>$/, '>'));
      continue;
    }
    if (token.kind === 'close' && token.name) {
      const index = stack.lastIndexOf(token.name);
      if (index === -1) continue;
      while (stack.length > index + 1) {
        out.push(`</${stack.pop()}>`);
      }
      stack.pop();
      out.push(`</${token.name}>`);
      continue;
    }
    if (token.kind === 'text') {
      // Escape stray '<' so dropping a closer can never splice a new tag together
      const inRawText = stack.length > 0 && RAW_TEXT_ELEMENTS.has(stack[stack.length - 1]);
      out.push(inRawText ? token.raw : token.raw.replace(/</g, '&lt;'));
      continue;
    }
    out.push(token.raw);
  }

  while (stack.length > 0) {
    out.push(`</${stack.pop()}>`);
  }
  return out.join('');
}

// ============================================================================
// Cleaning & Text
// ============================================================================

/**
 * Removes markdown code fences that models wrap around HTML.
 *
 * @example
 * stripCodeFences('```html\n<p>Hi</p>\n```') // '<p>Hi</p>'
 */
export function stripCodeFences(text: string): string {
  return text
    .replace(/^\s*```[a-zA-Z]*\s*$/gm, '')
    .replace(/```/g, '')
    .trim();
}

/**
 * Text a reader would see: raw-text elements and comments dropped,
 * every tag replaced by a space, common entities decoded.
 */
export function visibleText(html: string): string {
  return html
    .replace(/<(script|style)\b[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/g, "'");
}

/**
 * Words of visible text, counted by whitespace split.
 *
 * @example
 * countWords('<h2>Intro</h2><p>Two words</p>') // 3
 */
export function countWords(html: string): number {
  return visibleText(html)
    .split(/\s+/)
    .filter((word) => word.length > 0).length;
}

/**
 * First `maxLength` characters of visible text, cut at a word boundary.
 */
export function excerptOf(html: string, maxLength: number): string {
  const text = visibleText(html).replace(/\s+/g, ' ').trim();
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut).trim();
}

/**
 * Escapes text for safe inclusion in HTML text or attribute values.
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
