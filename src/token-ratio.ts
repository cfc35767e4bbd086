/**
 * Token Ratios
 *
 * Word-order independent fuzzy matching for venue names, so that
 * "ANCHOR AND CROWN" and "CROWN AND ANCHOR" compare as equal.
 *
 * Algorithms (on top of the Indel ratio):
 * - Token Sort Ratio: sort tokens, then compare the joined strings
 * - Token Set Ratio: compare intersection vs (intersection + remainder1)
 *   vs (intersection + remainder2) and return the MAX
 *
 * Also exposes the name-scorer registry the matcher picks from.
 */

import { indelRatio } from './edit-ratio.js';
import { jaroWinklerSimilarity } from './jaro-winkler.js';

// ============================================================================
// TOKENIZATION
// ============================================================================

/**
 * Split a normalized key into whitespace-separated tokens.
 * "THE CROWN AND ANCHOR" → ["THE", "CROWN", "AND", "ANCHOR"]
 */
export function tokenize(key: string): string[] {
  if (!key) return [];
  return key.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Sort tokens alphabetically and join.
 * ["CROWN", "ANCHOR"] → "ANCHOR CROWN"
 */
export function sortedTokenString(tokens: Iterable<string>): string {
  return [...tokens].sort().join(' ');
}

// ============================================================================
// TOKEN RATIOS
// ============================================================================

/**
 * Calculate Token Sort Ratio.
 *
 * "CROWN ANCHOR" vs "ANCHOR CROWN" → 1.0
 */
export function tokenSortRatio(s1: string, s2: string): number {
  const tokens1 = tokenize(s1);
  const tokens2 = tokenize(s2);

  if (tokens1.length === 0 || tokens2.length === 0) return 0;

  return indelRatio(sortedTokenString(tokens1), sortedTokenString(tokens2));
}

/**
 * Calculate Token Set Ratio.
 *
 * Steps:
 * 1. Tokenize both strings into sets
 * 2. Split into intersection and the two remainders
 * 3. A full intersection with one side having no remainder scores 1
 * 4. Otherwise return the MAX Indel ratio among
 *    intersection vs intersection+remainder1,
 *    intersection vs intersection+remainder2,
 *    intersection+remainder1 vs intersection+remainder2
 *
 * Example: "CROWN AND ANCHOR" vs "CROWN AND ANCHOR PUB" → 1.0
 */
export function tokenSetRatio(s1: string, s2: string): number {
  const tokens1 = new Set(tokenize(s1));
  const tokens2 = new Set(tokenize(s2));

  if (tokens1.size === 0 || tokens2.size === 0) return 0;

  const intersection: string[] = [];
  const remainder1: string[] = [];
  const remainder2: string[] = [];

  for (const token of tokens1) {
    if (tokens2.has(token)) {
      intersection.push(token);
    } else {
      remainder1.push(token);
    }
  }

  for (const token of tokens2) {
    if (!tokens1.has(token)) {
      remainder2.push(token);
    }
  }

  if (intersection.length > 0 && (remainder1.length === 0 || remainder2.length === 0)) {
    return 1;
  }

  const sect = sortedTokenString(intersection);
  const join = (rest: string[]): string =>
    [sect, sortedTokenString(rest)].filter(Boolean).join(' ');

  const combined1 = join(remainder1);
  const combined2 = join(remainder2);

  const scores = [indelRatio(combined1, combined2)];
  if (sect) {
    scores.push(indelRatio(sect, combined1), indelRatio(sect, combined2));
  }

  return Math.max(...scores);
}

// ============================================================================
// NAME SCORERS
// ============================================================================

export type NameScorer = 'token-sort' | 'token-set' | 'ratio' | 'jaro-winkler';

export const NAME_SCORER_NAMES = ['token-sort', 'token-set', 'ratio', 'jaro-winkler'] as const;

/**
 * Name scorers by config key. All are symmetric and return 0-1.
 */
export const NAME_SCORERS: Record<NameScorer, (a: string, b: string) => number> = {
  'token-sort': tokenSortRatio,
  'token-set': tokenSetRatio,
  ratio: indelRatio,
  'jaro-winkler': (a, b) => jaroWinklerSimilarity(a, b),
};

/**
 * Score two normalized name keys with the chosen scorer.
 * Either key empty → 0, since a missing name carries no evidence.
 */
export function nameSimilarity(
  key1: string,
  key2: string,
  scorer: NameScorer = 'token-sort'
): number {
  if (!key1 || !key2) return 0;
  return NAME_SCORERS[scorer](key1, key2);
}

/**
 * Every scorer's value for a pair of keys (for the compare command).
 */
export function scoreWithAllScorers(key1: string, key2: string): Record<NameScorer, number> {
  return {
    'token-sort': nameSimilarity(key1, key2, 'token-sort'),
    'token-set': nameSimilarity(key1, key2, 'token-set'),
    ratio: nameSimilarity(key1, key2, 'ratio'),
    'jaro-winkler': nameSimilarity(key1, key2, 'jaro-winkler'),
  };
}
