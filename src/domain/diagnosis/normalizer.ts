/**
 * Canonical form for comparing diagnosis names.
 *
 * Lower-cases, turns every character that is not a letter, mark, digit or
 * whitespace (hyphens, underscores, slashes, commas, ...) into a space,
 * collapses whitespace runs and trims. Applied once to each term at load
 * and once to each query.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Split an already-normalized string into tokens. */
export function tokenize(normalized: string): string[] {
  return normalized === "" ? [] : normalized.split(" ");
}
