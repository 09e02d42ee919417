import { editSimilarity } from "../../data-sources/edit-distance.js";
import { tokenize } from "./normalizer.js";
import type { MatchResult, Term } from "./types.js";

/**
 * Pluggable similarity function. Both inputs are already normalized;
 * the result is an integer 0-100.
 */
export interface Scorer {
  score(normalizedQuery: string, normalizedCandidate: string): number;
  /**
   * Bind the query once for a ranking pass. The returned function must
   * agree with score(normalizedQuery, candidate).
   */
  prepare?(normalizedQuery: string): (normalizedCandidate: string) => number;
}

/** A match plus the fields the ranking order needs. */
export interface RankedMatch extends MatchResult {
  normalizedName: string;
  exact: boolean;
}

function tokenSet(normalized: string): string[] {
  return [...new Set(tokenize(normalized))].sort();
}

/**
 * Length-weighted mean of each `from` token's best edit similarity
 * against the `to` tokens, in [0, 1].
 */
function coverage(from: readonly string[], to: readonly string[]): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const token of from) {
    let best = 0;
    for (const other of to) {
      const similarity = editSimilarity(token, other);
      if (similarity > best) best = similarity;
      if (best === 1) break;
    }
    weighted += best * token.length;
    totalWeight += token.length;
  }
  return weighted / totalWeight;
}

function scoreTokenSets(queryTokens: readonly string[], candidateTokens: readonly string[]): number {
  if (queryTokens.length === 0 || candidateTokens.length === 0) return 0;
  const best = Math.max(
    coverage(queryTokens, candidateTokens),
    coverage(candidateTokens, queryTokens),
  );
  return Math.min(100, Math.max(0, Math.round(best * 100)));
}

/**
 * Token-order-insensitive partial similarity.
 *
 * Each token on one side is paired with its closest token on the other by
 * edit similarity, and the best similarities are averaged weighted by token
 * length. This is done in both directions and the higher mean wins, so a
 * side whose tokens all appear in the other scores 100 whichever side
 * carries the extra words.
 */
export const tokenSetScorer: Scorer = {
  score(normalizedQuery: string, normalizedCandidate: string): number {
    if (normalizedQuery === normalizedCandidate) return 100;
    return scoreTokenSets(tokenSet(normalizedQuery), tokenSet(normalizedCandidate));
  },

  prepare(normalizedQuery: string): (normalizedCandidate: string) => number {
    const queryTokens = tokenSet(normalizedQuery);
    return (normalizedCandidate) =>
      normalizedCandidate === normalizedQuery
        ? 100
        : scoreTokenSets(queryTokens, tokenSet(normalizedCandidate));
  },
};

/**
 * Ranking order: score desc, exact match first, shorter name first,
 * then code-unit order of the name, then of the term id.
 */
export function compareMatches(a: RankedMatch, b: RankedMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.exact !== b.exact) return a.exact ? -1 : 1;
  if (a.normalizedName.length !== b.normalizedName.length) {
    return a.normalizedName.length - b.normalizedName.length;
  }
  if (a.normalizedName !== b.normalizedName) {
    return a.normalizedName < b.normalizedName ? -1 : 1;
  }
  if (a.termId !== b.termId) return a.termId < b.termId ? -1 : 1;
  return 0;
}

/**
 * Score every candidate and return those at or above threshold, ranked.
 */
export function rank(
  normalizedQuery: string,
  candidates: readonly Term[],
  threshold: number,
  scorer: Scorer = tokenSetScorer,
): RankedMatch[] {
  const matches: RankedMatch[] = [];
  const scoreCandidate = scorer.prepare
    ? scorer.prepare(normalizedQuery)
    : (candidate: string) => scorer.score(normalizedQuery, candidate);

  for (const term of candidates) {
    const score = scoreCandidate(term.normalizedName);
    if (score < threshold) continue;
    matches.push({
      termId: term.id,
      code: term.code,
      name: term.rawName,
      score,
      normalizedName: term.normalizedName,
      exact: term.normalizedName === normalizedQuery,
    });
  }

  return matches.sort(compareMatches);
}

/**
 * K-way merge of independently ranked lists. Output order is the same as
 * ranking the concatenated input.
 */
export function mergeRanked(parts: readonly RankedMatch[][]): RankedMatch[] {
  const cursors = parts.map(() => 0);
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const merged: RankedMatch[] = [];

  while (merged.length < total) {
    let bestPart = -1;
    for (let p = 0; p < parts.length; p++) {
      if (cursors[p] >= parts[p].length) continue;
      if (
        bestPart === -1 ||
        compareMatches(parts[p][cursors[p]], parts[bestPart][cursors[bestPart]]) < 0
      ) {
        bestPart = p;
      }
    }
    merged.push(parts[bestPart][cursors[bestPart]]);
    cursors[bestPart]++;
  }

  return merged;
}

/**
 * Rank in fixed-size shards and merge. Shards are independent, so they can
 * be handed to separate workers; run inline they give the same output as rank().
 */
export function rankSharded(
  normalizedQuery: string,
  candidates: readonly Term[],
  threshold: number,
  shardSize: number,
  scorer: Scorer = tokenSetScorer,
): RankedMatch[] {
  if (shardSize < 1) {
    throw new Error(`Invalid shard size: ${shardSize}. Must be >= 1`);
  }
  if (candidates.length <= shardSize) {
    return rank(normalizedQuery, candidates, threshold, scorer);
  }

  const parts: RankedMatch[][] = [];
  for (let i = 0; i < candidates.length; i += shardSize) {
    parts.push(
      rank(normalizedQuery, candidates.slice(i, i + shardSize), threshold, scorer),
    );
  }
  return mergeRanked(parts);
}
