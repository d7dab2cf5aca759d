import { decodeHTML } from 'entities';

// Any <...> span, shortest match
const MARKUP_PATTERN = /<[^>]*>/g;

const SLUG_DENYLIST = /[(),/:’]/g;

/**
 * Drop inline markup from a line of prose.
 */
export function stripMarkup(text: string): string {
  return text.replace(MARKUP_PATTERN, '');
}

/**
 * Derive an identifier fragment from a title.
 * "Scope (General), Part 1" -> "scope-general-part-1"
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .replace(/ /g, '-')
    .replace(SLUG_DENYLIST, '');
}

/**
 * Decode HTML character references, named and numeric.
 */
export function decodeEntities(text: string): string {
  return decodeHTML(text);
}
