/**
 * Label normalization.
 *
 * Two labels share a key iff they differ only by case, surrounding or internal
 * whitespace, or punctuation. Spaces are removed entirely, so "Data Base" and
 * "Database" share a key as well.
 */

const NON_WORD = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE = /\s+/g;

export function normalizeLabel(text: string): string {
  return text.toLowerCase().trim().replace(NON_WORD, '').replace(WHITESPACE, ' ').replace(/ /g, '');
}
