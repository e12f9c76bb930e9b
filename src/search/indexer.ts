/**
 * Indexer
 *
 * Builds per-record, per-field term frequencies plus corpus-wide document
 * frequencies. The index is rebuilt from scratch for every corpus and never
 * updated in place.
 */

import { logger } from "../logger.js";
import type { Corpus, EndpointRecord } from "../types/corpus.js";
import {
  INDEXED_FIELDS,
  type IndexedField,
  type RankingConfig,
  type RecordTermStats,
  type SearchIndex,
} from "../types/retrieval.js";
import { normalize } from "./analyzer.js";

export const DEFAULT_RANKING_CONFIG: RankingConfig = Object.freeze({
  fieldWeights: Object.freeze({
    path: 3.0,
    name: 2.0,
    description: 1.5,
    parameters: 1.0,
    tags: 0.5,
  }),
  pathMatchBonus: 2.0,
  fullCoverageBonus: 1.0,
});

function fieldText(record: EndpointRecord, field: IndexedField): string {
  switch (field) {
    case "path":
      return record.path;
    case "name":
      return record.name ?? "";
    case "description":
      return record.description;
    case "parameters":
      return record.parameters.map((param) => param.name).join(" ");
    case "tags":
      return [...record.tags, record.category ?? ""].join(" ");
  }
}

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function indexRecord(
  record: EndpointRecord,
  ranking: RankingConfig
): RecordTermStats {
  const termsOf = (field: IndexedField) =>
    countTerms(normalize(fieldText(record, field)));
  const fields: Record<IndexedField, Map<string, number>> = {
    path: termsOf("path"),
    name: termsOf("name"),
    description: termsOf("description"),
    parameters: termsOf("parameters"),
    tags: termsOf("tags"),
  };
  const weightedFrequencies = new Map<string, number>();

  for (const field of INDEXED_FIELDS) {
    const weight = ranking.fieldWeights[field];
    for (const [term, tf] of fields[field]) {
      weightedFrequencies.set(
        term,
        (weightedFrequencies.get(term) ?? 0) + weight * tf
      );
    }
  }

  return {
    fields,
    weightedFrequencies,
    normalizedPath: normalize(record.path).join(" "),
  };
}

export function buildIndex(
  corpus: Corpus,
  ranking: RankingConfig = DEFAULT_RANKING_CONFIG
): SearchIndex {
  const startTime = Date.now();
  const records = corpus.records.map((record) => indexRecord(record, ranking));

  const documentFrequency = new Map<string, number>();
  const postings = new Map<string, number[]>();

  records.forEach((stats, recordIndex) => {
    const terms = new Set<string>();
    for (const field of INDEXED_FIELDS) {
      for (const term of stats.fields[field].keys()) terms.add(term);
    }
    for (const term of terms) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      const list = postings.get(term);
      if (list) {
        list.push(recordIndex);
      } else {
        postings.set(term, [recordIndex]);
      }
    }
  });

  logger.corpus("index built", {
    records: records.length,
    terms: documentFrequency.size,
    buildTime: Date.now() - startTime,
  });

  return {
    corpus,
    ranking,
    records,
    documentFrequency,
    postings,
    size: records.length,
  };
}

/**
 * IDF = ln(1 + N / df). Terms absent from the corpus weigh nothing.
 */
export function inverseDocumentFrequency(
  index: SearchIndex,
  term: string
): number {
  const df = index.documentFrequency.get(term) ?? 0;
  if (df === 0) return 0;
  return Math.log(1 + index.size / df);
}
