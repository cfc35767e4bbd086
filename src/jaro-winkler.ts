/**
 * Jaro-Winkler String Similarity
 *
 * Alternative name scorer for venue keys. Favors strings that share a prefix,
 * which suits chain names with branch suffixes ("PRET A MANGER" vs
 * "PRET A MANGER HOLBORN").
 *
 * Algorithm:
 * 1. Jaro similarity counts characters matching within a sliding window and
 *    half the transpositions among them
 * 2. Winkler modification boosts strings with a common prefix (max 4 chars)
 */

const MAX_PREFIX = 4;

/**
 * Jaro similarity, 0 (no match) to 1 (exact match).
 */
export function jaroSimilarity(s1: string, s2: string): number {
  if (s1 === s2) return s1 ? 1 : 0;
  if (!s1 || !s2) return 0;

  const window = Math.max(0, Math.floor(Math.max(s1.length, s2.length) / 2) - 1);
  const taken1: boolean[] = new Array(s1.length).fill(false);
  const taken2: boolean[] = new Array(s2.length).fill(false);

  let matches = 0;
  for (let i = 0; i < s1.length; i++) {
    const from = Math.max(0, i - window);
    const to = Math.min(s2.length, i + window + 1);

    for (let j = from; j < to; j++) {
      if (!taken2[j] && s1[i] === s2[j]) {
        taken1[i] = true;
        taken2[j] = true;
        matches++;
        break;
      }
    }
  }

  if (matches === 0) return 0;

  // Walk both matched sequences in order; mismatched positions are transpositions
  let halfTranspositions = 0;
  let cursor = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!taken1[i]) continue;
    while (!taken2[cursor]) cursor++;
    if (s1[i] !== s2[cursor]) halfTranspositions++;
    cursor++;
  }

  const transpositions = halfTranspositions / 2;

  return (
    matches / s1.length +
    matches / s2.length +
    (matches - transpositions) / matches
  ) / 3;
}

/**
 * Calculate Jaro-Winkler similarity between two keys
 *
 * @param scalingFactor - Prefix scaling factor (default 0.1, clamped to 0.25)
 * @returns Similarity score between 0 and 1
 */
export function jaroWinklerSimilarity(
  s1: string,
  s2: string,
  scalingFactor: number = 0.1
): number {
  if (!s1 || !s2) return 0;
  if (s1 === s2) return 1;

  const p = Math.min(Math.max(scalingFactor, 0), 0.25);
  const jaro = jaroSimilarity(s1, s2);

  let prefix = 0;
  const limit = Math.min(s1.length, s2.length, MAX_PREFIX);
  while (prefix < limit && s1[prefix] === s2[prefix]) prefix++;

  return jaro + prefix * p * (1 - jaro);
}
