/**
 * URL Slug Generation Utility
 *
 * Slugs sent to the CMS with every publish call. The CMS would derive one from
 * the title anyway, but sending it keeps retries from producing "-2" variants.
 */

/**
 * Generate a URL-safe slug from a string.
 *
 * Lowercases, strips diacritics (é → e), collapses everything that is not
 * alphanumeric into single hyphens and trims hyphens at both ends.
 *
 * @example
 * slugify('Électric Bikes: A Buyer’s Guide')
 * // → "electric-bikes-a-buyer-s-guide"
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * Slugify and cut to a maximum length without leaving a trailing hyphen.
 */
export function slugifyWithLimit(value: string, maxLength: number): string {
  const slug = slugify(value);
  if (slug.length <= maxLength) return slug;
  return slug.slice(0, maxLength).replace(/-+$/, '');
}
