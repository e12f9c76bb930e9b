/**
 * Query Analyzer
 *
 * `normalize` is the single tokenizer for both corpus text and queries.
 * Index-time and query-time terms must come out of the same function or
 * exact-match scoring silently stops working.
 */

import type { Query } from "../types/retrieval.js";

export const MIN_TERM_LENGTH = 2;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "can",
  "do",
  "does",
  "for",
  "from",
  "how",
  "i",
  "in",
  "is",
  "it",
  "me",
  "my",
  "of",
  "on",
  "or",
  "the",
  "this",
  "to",
  "what",
  "which",
  "with",
  "you",
]);

/**
 * Lower-case, split on anything that is not [a-z0-9], drop short tokens and
 * stop words. No stemming.
 */
export function normalize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= MIN_TERM_LENGTH && !STOP_WORDS.has(token));
}

export function analyze(raw: string): Query {
  const terms = normalize(raw);
  return {
    raw,
    terms,
    distinctTerms: Array.from(new Set(terms)),
    normalized: terms.join(" "),
  };
}
