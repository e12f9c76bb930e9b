/**
 * Answer confidence heuristics
 *
 * confidence = 0.6 × coverage of the best result
 *            + 0.2 × query quality
 *            + 0.2 × context richness
 * clamped to [0.1, 1.0]; 0.1 when nothing matched.
 */

import type { RetrievalResponse } from "../types/retrieval.js";

export const MIN_CONFIDENCE = 0.1;

const API_TERMS = [
  "api",
  "endpoint",
  "method",
  "curl",
  "request",
  "create",
  "get",
  "list",
  "update",
  "delete",
] as const;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export function assessQueryQuality(query: string): number {
  const lower = query.toLowerCase();
  const words = new Set(lower.split(/[^a-z0-9]+/).filter(Boolean));
  const termCount = API_TERMS.filter((term) => words.has(term)).length;

  const wordCount = lower.split(/\s+/).filter(Boolean).length;
  const specificity = wordCount >= 4 ? 0.8 : wordCount >= 2 ? 0.5 : 0.2;
  const termScore = Math.min(termCount / API_TERMS.length, 1);

  return Math.min(specificity * 0.6 + termScore * 0.4, 1);
}

export function assessContextRichness(context: string): number {
  if (!context) return 0;

  const lines = context.split("\n");
  const nonEmpty = lines.filter((line) => line.trim().length > 0).length;
  const endpoints = lines.filter((line) => line.startsWith("Endpoint: ")).length;

  let richness = nonEmpty >= 10 ? 0.4 : nonEmpty >= 5 ? 0.2 : 0.1;
  if (lines.includes("Parameters:")) richness += 0.3;
  if (lines.includes("Example:")) richness += 0.2;
  if (endpoints > 1) richness += 0.1;

  return Math.min(richness, 1);
}

export function computeConfidence(response: RetrievalResponse): number {
  const best = response.results[0];
  if (!best) return MIN_CONFIDENCE;

  const distinctTerms = new Set(response.terms).size;
  const coverage = distinctTerms > 0 ? best.matchedTerms.length / distinctTerms : 0;

  return clamp(
    coverage * 0.6 +
      assessQueryQuality(response.query) * 0.2 +
      assessContextRichness(response.context) * 0.2,
    MIN_CONFIDENCE,
    1
  );
}
