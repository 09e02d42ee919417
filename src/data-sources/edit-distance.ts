/**
 * Levenshtein edit distance (insert, delete, substitute; unit cost).
 * Expects pre-normalized input (no case handling here).
 */
export function levenshtein(s1: string, s2: string): number {
  if (s1 === s2) return 0;
  if (s1.length === 0) return s2.length;
  if (s2.length === 0) return s1.length;

  // Keep the shorter string on the inner loop to bound the row size
  const [outer, inner] = s1.length >= s2.length ? [s1, s2] : [s2, s1];

  let previous = new Array<number>(inner.length + 1);
  let current = new Array<number>(inner.length + 1);
  for (let j = 0; j <= inner.length; j++) previous[j] = j;

  for (let i = 1; i <= outer.length; i++) {
    current[0] = i;
    for (let j = 1; j <= inner.length; j++) {
      const cost = outer[i - 1] === inner[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost, // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/**
 * Edit-distance similarity: 1 - distance / longer length.
 *
 * Returns 0.0 (nothing in common) to 1.0 (identical). Two empty strings
 * are identical.
 */
export function editSimilarity(s1: string, s2: string): number {
  const longest = Math.max(s1.length, s2.length);
  if (longest === 0) return 1.0;
  return 1 - levenshtein(s1, s2) / longest;
}
