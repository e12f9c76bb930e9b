/**
 * Ranker
 *
 * score(record) = Σ over query terms (duplicates included) of
 *   Σ over fields  weight(field) × tf(term, field) × ln(1 + N / df(term))
 * then, for records that scored above zero:
 *   + pathMatchBonus     when the normalized query occurs in the normalized path
 *   + fullCoverageBonus  when every distinct query term occurs in the record
 *
 * Ordering is by descending score with corpus order breaking ties.
 */

import type { Query, RankedResult, SearchIndex } from "../types/retrieval.js";
import { inverseDocumentFrequency } from "./indexer.js";

/**
 * Records sharing at least one term with the query, in corpus order
 */
function candidates(index: SearchIndex, query: Query): number[] {
  const found = new Set<number>();
  for (const term of query.distinctTerms) {
    for (const recordIndex of index.postings.get(term) ?? []) {
      found.add(recordIndex);
    }
  }
  return Array.from(found).sort((a, b) => a - b);
}

export function scoreRecord(
  index: SearchIndex,
  query: Query,
  recordIndex: number
): RankedResult {
  const stats = index.records[recordIndex];
  const matchedTerms = new Set<string>();
  let score = 0;

  for (const term of query.terms) {
    const weightedTf = stats.weightedFrequencies.get(term);
    if (weightedTf === undefined) continue;
    matchedTerms.add(term);
    score += weightedTf * inverseDocumentFrequency(index, term);
  }

  if (score > 0) {
    if (query.normalized && stats.normalizedPath.includes(query.normalized)) {
      score += index.ranking.pathMatchBonus;
    }
    if (matchedTerms.size === query.distinctTerms.length) {
      score += index.ranking.fullCoverageBonus;
    }
  }

  return { recordIndex, score, matchedTerms };
}

export function rank(
  index: SearchIndex,
  query: Query,
  k: number
): RankedResult[] {
  if (k <= 0 || query.terms.length === 0) return [];

  return candidates(index, query)
    .map((recordIndex) => scoreRecord(index, query, recordIndex))
    .filter((result) => result.score > 0)
    .sort((a, b) => b.score - a.score || a.recordIndex - b.recordIndex)
    .slice(0, k);
}
