import ratingLexicon from './lexicons/rating.json';

export const NEGATORS: ReadonlySet<string> = new Set(ratingLexicon.negators);

// Tokens after a negator that can still be flipped by it ("not very good").
export const NEGATION_WINDOW = 3;

/** Whether one of the tokens just before `index` in a matchable text is a negator. */
export function isNegatedAt(matchable: string, index: number): boolean {
  return matchable
    .slice(0, index)
    .split(' ')
    .filter(Boolean)
    .slice(-NEGATION_WINDOW)
    .some((token) => NEGATORS.has(token));
}

/**
 * True when `matcher` hits the matchable text at least once outside a
 * negator's window, so "no lag at all" does not count as "lag".
 */
export function matchesUnnegated(matcher: RegExp, matchable: string): boolean {
  for (const match of matchable.matchAll(new RegExp(matcher.source, 'g'))) {
    if (!isNegatedAt(matchable, match.index ?? 0)) return true;
  }
  return false;
}
