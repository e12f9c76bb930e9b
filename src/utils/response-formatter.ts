/**
 * Answer text formatting
 * Fixed answers and explanations returned alongside retrieval results
 */
import type { RetrievalResponse } from "../types/retrieval.js";

export const NO_MATCH_ANSWER =
  "I couldn't find any relevant information in the API documentation for your query. Please try asking about specific endpoints, for example creating, updating or listing a resource.";

/**
 * Answer used when no language model is configured
 */
export function formatRetrievalOnlyAnswer(response: RetrievalResponse): string {
  const count = response.results.length;
  return `Here ${count === 1 ? "is the most relevant endpoint" : `are the ${count} most relevant endpoints`} from the documentation:\n\n${response.context}`;
}

/**
 * Answer used when the language model failed
 */
export function formatDegradedAnswer(response: RetrievalResponse): string {
  return `I found some relevant information but encountered an error processing it. Here's what I found:\n\n${response.context}`;
}

export function formatExplanation(
  response: RetrievalResponse,
  confidence: number
): string {
  let explanation = `Found ${response.results.length} relevant endpoint${response.results.length === 1 ? "" : "s"}. `;

  const best = response.results[0];
  if (best) {
    explanation += `Best match: '${best.name ?? `${best.method} ${best.path}`}' with score ${best.score.toFixed(2)}. `;
  }
  if (response.omitted > 0) {
    explanation += `${response.omitted} more left out of the context for length. `;
  }

  return `${explanation}Overall confidence: ${confidence.toFixed(2)}`;
}
