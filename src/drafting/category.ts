import { CATEGORY_CONFIG } from '../pipeline/config';
import type { CategoryOption } from '../pipeline/types';

function isSentinel(name: string): boolean {
  return name.trim().toLowerCase() === CATEGORY_CONFIG.SENTINEL_NAME.toLowerCase();
}

/**
 * Looks up a category by name: exact match first, then case-insensitive.
 */
export function findCategory(
  name: string,
  categories: readonly CategoryOption[]
): CategoryOption | undefined {
  const trimmed = name.trim();
  const exact = categories.find((c) => c.name === trimmed);
  if (exact) return exact;
  const lowered = trimmed.toLowerCase();
  return categories.find((c) => c.name.toLowerCase() === lowered);
}

/**
 * Maps a model-chosen category onto the caller's list.
 *
 * A chosen name that is missing from the list, or is the "uncategorized"
 * sentinel, is replaced by the first non-sentinel category. The sentinel is
 * only returned when nothing else exists.
 *
 * @example
 * resolveCategory('uncategorized', [{ id: '1', name: 'Uncategorized' }, { id: '7', name: 'Tech' }])
 * // { id: '7', name: 'Tech' }
 */
export function resolveCategory(
  chosen: string | undefined,
  categories: readonly CategoryOption[]
): CategoryOption {
  if (chosen && !isSentinel(chosen)) {
    const match = findCategory(chosen, categories);
    if (match && !isSentinel(match.name)) return match;
  }

  const firstReal = categories.find((c) => !isSentinel(c.name));
  if (firstReal) return firstReal;

  return (
    categories.find((c) => isSentinel(c.name)) ?? {
      id: CATEGORY_CONFIG.SENTINEL_DEFAULT_ID,
      name: CATEGORY_CONFIG.SENTINEL_NAME,
    }
  );
}
