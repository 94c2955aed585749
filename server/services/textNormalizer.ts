/**
 * Text normalisation shared by user questions and reference aliases.
 *
 * Both sides go through `normalize` so that matching only ever compares
 * lowercase, accent-free words separated by single spaces.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const APOSTROPHES = /[\u2018\u2019`\u00b4]/g;
// "Bayern's", "Klaus'" (German possessive after a sibilant)
const POSSESSIVE_SUFFIX = /(?:'s?)+(?=[^\p{L}\p{N}]|$)/gu;
const NON_WORD = /[^\p{L}\p{N}]+/gu;

export function normalize(text: string): string {
  return text
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(/ß/g, 'ss')
    .replace(APOSTROPHES, "'")
    .replace(POSSESSIVE_SUFFIX, '')
    .replace(NON_WORD, ' ')
    .trim();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word pattern for an already normalised alias. The last word may carry
 * a bare possessive "s", so `bayern` also matches "who is bayerns coach".
 */
export function buildAliasPattern(normalizedAlias: string): RegExp {
  const words = normalizedAlias.split(' ').filter(word => word.length > 0).map(escapeRegExp);
  return new RegExp(`(?:^|\\s)${words.join('\\s+')}s?(?=\\s|$)`, 'u');
}
