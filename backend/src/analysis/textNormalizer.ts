// C0/C1 control characters except the whitespace ones collapsed below.
const CONTROL_CHARS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g;
const ZERO_WIDTH = /[\u200B-\u200D\uFEFF]/g;

export function normalize(text: unknown): string {
  if (typeof text !== 'string' || !text) return '';
  return text
    .normalize('NFC')
    .replace(CONTROL_CHARS, '')
    .replace(ZERO_WIDTH, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lowercase form that keyword lexicons are matched against: apostrophes are
 * dropped ("don't" -> "dont") and every other run of punctuation becomes a
 * single space.
 */
export function toMatchable(text: unknown): string {
  return normalize(text)
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/[\W_]+/g, ' ')
    .trim();
}

export function tokenize(text: unknown): string[] {
  const matchable = toMatchable(text);
  return matchable ? matchable.split(' ') : [];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a phrase into a matcher anchored at a word start, so "disconnect"
 * also finds "disconnects" but "comfortable" does not find "uncomfortable".
 */
export function phraseMatcher(phrase: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(toMatchable(phrase))}`);
}
