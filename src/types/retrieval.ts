/**
 * Retrieval Type Definitions
 *
 * Query, index and ranking shapes shared by the analyzer, indexer, ranker
 * and context assembler.
 */

import type { Corpus, HttpMethod } from "./corpus.js";

export const INDEXED_FIELDS = [
  "path",
  "name",
  "description",
  "parameters",
  "tags",
] as const;

export type IndexedField = (typeof INDEXED_FIELDS)[number];

export type FieldWeights = Readonly<Record<IndexedField, number>>;

export interface RankingConfig {
  readonly fieldWeights: FieldWeights;
  /** Added when the whole normalized query occurs inside the normalized path */
  readonly pathMatchBonus: number;
  /** Added when every distinct query term occurs somewhere in the record */
  readonly fullCoverageBonus: number;
}

export interface Query {
  readonly raw: string;
  /** Normalized terms in query order, duplicates kept */
  readonly terms: readonly string[];
  readonly distinctTerms: readonly string[];
  /** Terms joined by single spaces */
  readonly normalized: string;
}

export type TermFrequencies = ReadonlyMap<string, number>;

export interface RecordTermStats {
  readonly fields: Readonly<Record<IndexedField, TermFrequencies>>;
  /** Sum over fields of weight × term frequency */
  readonly weightedFrequencies: TermFrequencies;
  /** Path tokens joined by single spaces */
  readonly normalizedPath: string;
}

export interface SearchIndex {
  readonly corpus: Corpus;
  readonly ranking: RankingConfig;
  readonly records: readonly RecordTermStats[];
  /** Number of records containing the term in any field */
  readonly documentFrequency: ReadonlyMap<string, number>;
  /** Record indices containing the term, ascending */
  readonly postings: ReadonlyMap<string, readonly number[]>;
  readonly size: number;
}

export interface RankedResult {
  /** Position of the record in the corpus */
  readonly recordIndex: number;
  readonly score: number;
  readonly matchedTerms: ReadonlySet<string>;
}

export interface RetrievedEndpoint {
  readonly recordIndex: number;
  readonly method: HttpMethod;
  readonly path: string;
  readonly name?: string;
  readonly description: string;
  readonly score: number;
  readonly matchedTerms: readonly string[];
}

export interface RetrievalResponse {
  readonly query: string;
  readonly terms: readonly string[];
  readonly results: readonly RetrievedEndpoint[];
  readonly context: string;
  /** Ranked records left out of the context for lack of space */
  readonly omitted: number;
}
