/**
 * Answer Service
 *
 * Retrieval first, generation second. Retrieval results are always returned;
 * a missing or failing language model only downgrades the answer to
 * "retrieval-only".
 */

import { errorMessage } from "../errors.js";
import type { AnswerGenerator } from "../llm/chat-completion-client.js";
import { logger } from "../logger.js";
import { computeConfidence } from "../search/confidence.js";
import {
  formatDegradedAnswer,
  formatExplanation,
  formatRetrievalOnlyAnswer,
  NO_MATCH_ANSWER,
} from "../utils/response-formatter.js";
import type {
  RetrievalOptions,
  RetrievalService,
  VersionedRetrieval,
} from "./retrieval-service.js";

export type AnswerMode = "generated" | "retrieval-only";

export interface AskOptions extends RetrievalOptions {
  /** Set false to skip the language model even when one is configured */
  readonly generate?: boolean;
  readonly signal?: AbortSignal;
}

export interface QueryAnswer {
  readonly answer: string;
  readonly mode: AnswerMode;
  readonly confidence: number;
  readonly explanation: string;
  readonly retrieval: VersionedRetrieval;
  readonly processingTimeMs: number;
}

export class AnswerService {
  constructor(
    private readonly retrieval: RetrievalService,
    private readonly generator: AnswerGenerator | null = null
  ) {}

  hasGenerator(): boolean {
    return this.generator !== null;
  }

  async ask(query: string, options: AskOptions = {}): Promise<QueryAnswer> {
    const startTime = Date.now();
    const { generate = true, signal, ...retrievalOptions } = options;

    const retrieval = this.retrieval.retrieve(query, retrievalOptions);
    const confidence = computeConfidence(retrieval);
    const explanation = formatExplanation(retrieval, confidence);

    const finish = (answer: string, mode: AnswerMode): QueryAnswer => ({
      answer,
      mode,
      confidence,
      explanation,
      retrieval,
      processingTimeMs: Date.now() - startTime,
    });

    if (retrieval.results.length === 0) {
      return finish(NO_MATCH_ANSWER, "retrieval-only");
    }

    if (!generate || !this.generator) {
      return finish(formatRetrievalOnlyAnswer(retrieval), "retrieval-only");
    }

    try {
      const answer = await this.generator.generateAnswer(
        query,
        retrieval.context,
        signal
      );
      return finish(answer, "generated");
    } catch (error) {
      logger.error("Answer generation failed, returning retrieval results", {
        error: errorMessage(error),
        results: retrieval.results.length,
      });
      return finish(formatDegradedAnswer(retrieval), "retrieval-only");
    }
  }
}
