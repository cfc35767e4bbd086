/**
 * Indel Ratio
 *
 * Normalized edit similarity where only insertions and deletions count:
 *
 *   ratio = 1 - indel(a, b) / (|a| + |b|)
 *
 * indel(a, b) = |a| + |b| - 2 * LCS(a, b), so the ratio equals
 * 2 * LCS / (|a| + |b|). This is the same ratio SequenceMatcher-style
 * fuzzy matchers report, scaled to 0-1.
 */

/**
 * Length of the longest common subsequence.
 * Two-row dynamic programming, O(|a| * |b|) time, O(min) space.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (!a || !b) return 0;

  // Keep the shorter string on the row axis
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];

  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    const ch = outer[i - 1];
    for (let j = 1; j <= inner.length; j++) {
      if (ch === inner[j - 1]) {
        current[j] = previous[j - 1] + 1;
      } else {
        current[j] = Math.max(previous[j], current[j - 1]);
      }
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/**
 * Insert/delete edit distance.
 */
export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b);
}

/**
 * Normalized Indel similarity between two strings.
 *
 * @returns 1 for identical non-empty strings, 0 when nothing is shared
 *   or either string is empty
 */
export function indelRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 1;

  return 1 - indelDistance(a, b) / (a.length + b.length);
}
