/**
 * Prompt text for answer generation
 */

export const SYSTEM_PROMPT =
  "You are an expert on REST API documentation. Provide accurate, helpful answers based only on the given context.";

export function buildAnswerPrompt(query: string, context: string): string {
  return [
    "You are a helpful assistant for API documentation.",
    "Use the following context to answer the user's question.",
    "If the context doesn't contain the answer, say so.",
    "",
    "CONTEXT:",
    context,
    "",
    `QUESTION: ${query}`,
    "",
    "Please provide a clear, helpful answer based on the context above:",
  ].join("\n");
}
