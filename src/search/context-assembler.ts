/**
 * Context Assembler
 *
 * Renders ranked endpoints into the text handed to answer generation.
 * Records are never cut in half: one that does not fit the remaining budget
 * is left out and the next one is tried.
 */

import type { EndpointRecord } from "../types/corpus.js";
import type {
  Query,
  RankedResult,
  RetrievalResponse,
  RetrievedEndpoint,
  SearchIndex,
} from "../types/retrieval.js";

export const NO_RELEVANT_ENDPOINT_CONTEXT = "No relevant endpoint found.";

export const RECORD_SEPARATOR = "\n---\n\n";

export function renderRecord(record: EndpointRecord, score: number): string {
  const lines = [
    `Endpoint: ${record.name ? `${record.name} (${record.method})` : `${record.method} ${record.path}`}`,
    `Relevance: ${score.toFixed(2)}`,
    `Method: ${record.method}`,
    `Path: ${record.path}`,
  ];

  if (record.description) {
    lines.push(`Description: ${record.description}`);
  }

  const labels = record.category ? [record.category, ...record.tags] : record.tags;
  if (labels.length > 0) {
    lines.push(`Tags: ${labels.join(", ")}`);
  }

  if (record.parameters.length > 0) {
    lines.push("Parameters:");
    for (const param of record.parameters) {
      let line = `  - ${param.name} (${param.type}, ${param.location})`;
      if (param.required) line += " [Required]";
      if (param.default !== undefined) line += ` [Default: ${param.default}]`;
      if (param.description) line += `: ${param.description}`;
      lines.push(line);
    }
  }

  if (record.example) {
    lines.push("Example:", record.example);
  }

  return `${lines.join("\n")}\n`;
}

export function assemble(
  index: SearchIndex,
  query: Query,
  ranked: readonly RankedResult[],
  maxContextLength: number
): RetrievalResponse {
  const blocks: string[] = [];
  const results: RetrievedEndpoint[] = [];
  let used = 0;

  for (const result of ranked) {
    const record = index.corpus.records[result.recordIndex];
    const block = renderRecord(record, result.score);
    const cost = block.length + (blocks.length > 0 ? RECORD_SEPARATOR.length : 0);
    if (used + cost > maxContextLength) continue;

    used += cost;
    blocks.push(block);
    results.push({
      recordIndex: result.recordIndex,
      method: record.method,
      path: record.path,
      ...(record.name !== undefined && { name: record.name }),
      description: record.description,
      score: result.score,
      matchedTerms: query.distinctTerms.filter((term) =>
        result.matchedTerms.has(term)
      ),
    });
  }

  return {
    query: query.raw,
    terms: query.terms,
    results,
    context:
      blocks.length > 0 ? blocks.join(RECORD_SEPARATOR) : NO_RELEVANT_ENDPOINT_CONTEXT,
    omitted: ranked.length - results.length,
  };
}
