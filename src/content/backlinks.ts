import { registrableDomain } from '../research/url-utils';

/**
 * Lead-in phrases for inserted reference sentences, per language.
 * A sentence reads: `<phrase> <a>domain</a>.`
 */
export const BACKLINK_PHRASES: Readonly<Record<string, readonly string[]>> = {
  en: [
    'For more details, see',
    'Further reading is available at',
    'You can find additional information on',
    'A useful reference on this topic is',
  ],
  fr: [
    'Pour plus de détails, consultez',
    'Vous trouverez plus d’informations sur',
    'Une référence utile sur ce sujet est',
  ],
  es: [
    'Para más detalles, consulte',
    'Puede encontrar más información en',
    'Una referencia útil sobre este tema es',
  ],
};

export const DEFAULT_BACKLINK_LANGUAGE = 'en';

/**
 * Phrase set for a language code such as `fr` or `es-MX`; English otherwise.
 */
export function phrasesFor(language: string): readonly string[] {
  const base = language.toLowerCase().split(/[-_]/)[0];
  return BACKLINK_PHRASES[base] ?? BACKLINK_PHRASES[DEFAULT_BACKLINK_LANGUAGE] ?? [];
}

/**
 * Picks candidate URLs whose registrable domain is not already present.
 *
 * @param presentDomains registrable domains already linked from the document
 * @param text lowercased visible text of the document
 */
export function selectBacklinks(
  candidates: readonly string[],
  presentDomains: ReadonlySet<string>,
  text: string,
  max: number
): Array<{ readonly url: string; readonly domain: string }> {
  const chosen: Array<{ url: string; domain: string }> = [];
  const used = new Set(presentDomains);

  for (const url of candidates) {
    if (chosen.length >= max) break;
    const domain = registrableDomain(url);
    if (!domain || used.has(domain) || text.includes(domain)) continue;
    used.add(domain);
    chosen.push({ url, domain });
  }
  return chosen;
}

/**
 * 0-based indexes of the paragraphs that receive a sentence: every
 * `interval`-th paragraph, or the last one when there are fewer than
 * `interval` paragraphs.
 */
export function backlinkSlots(paragraphCount: number, interval: number, max: number): number[] {
  if (paragraphCount === 0 || max <= 0) return [];
  const step = Math.max(1, interval);
  const slots: number[] = [];
  for (let i = step - 1; i < paragraphCount && slots.length < max; i += step) {
    slots.push(i);
  }
  return slots.length > 0 ? slots : [paragraphCount - 1];
}
