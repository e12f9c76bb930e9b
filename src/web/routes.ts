/**
 * HTTP routes
 *
 * POST /query     retrieval plus optional answer generation
 * POST /retrieve  retrieval only
 * GET  /health    liveness and index summary
 * GET  /debug     loaded endpoints and load metadata
 * POST /reload    rebuild the index from the corpus source
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { logger } from "../logger.js";
import type { AnswerService } from "../services/answer-service.js";
import type { RetrievalService } from "../services/retrieval-service.js";
import { endpointLabel } from "../types/corpus.js";
import type { AppConfig } from "../types/env.js";

export const APP_VERSION = "1.0.0";

export interface RouteDependencies {
  readonly config: AppConfig;
  readonly retrieval: RetrievalService;
  readonly answers: AnswerService;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");

export function registerRoutes(
  server: FastifyInstance,
  { config, retrieval, answers }: RouteDependencies
): void {
  const retrieveBodySchema = z.object({
    query: z
      .string()
      .trim()
      .min(1, "query must not be empty")
      .max(
        config.MAX_QUERY_LENGTH,
        `query must be at most ${config.MAX_QUERY_LENGTH} characters`
      ),
    k: z.number().int().min(1).max(config.MAX_RESULT_COUNT).optional(),
    maxContextLength: z.number().int().positive().optional(),
  });
  const queryBodySchema = retrieveBodySchema.extend({
    generate: z.boolean().optional(),
  });

  const isAuthorizedForReload = (request: FastifyRequest): boolean =>
    !config.RELOAD_TOKEN ||
    request.headers.authorization === `Bearer ${config.RELOAD_TOKEN}`;

  server.post("/query", async (request, reply) => {
    const body = queryBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({
        error: "Invalid request",
        message: formatIssues(body.error),
      });
    }

    const { query, ...options } = body.data;
    const result = await answers.ask(query, options);
    const { retrieval: found } = result;

    return {
      answer: result.answer,
      mode: result.mode,
      confidence: result.confidence,
      explanation: result.explanation,
      sources: found.results.map((endpoint) => `${endpoint.method} ${endpoint.path}`),
      results: found.results,
      context: found.context,
      omitted: found.omitted,
      terms: found.terms,
      indexVersion: found.indexVersion,
      processingTimeMs: result.processingTimeMs,
    };
  });

  server.post("/retrieve", async (request, reply) => {
    const body = retrieveBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({
        error: "Invalid request",
        message: formatIssues(body.error),
      });
    }

    const { query, ...options } = body.data;
    return retrieval.retrieve(query, options);
  });

  server.get("/health", async () => {
    const snapshot = retrieval.snapshot();
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      environment: config.NODE_ENV,
      version: APP_VERSION,
      indexVersion: snapshot.version,
      endpoints: snapshot.corpus.metadata.count,
      answerGeneration: answers.hasGenerator(),
    };
  });

  server.get("/debug", async () => {
    const snapshot = retrieval.snapshot();
    return {
      total_endpoints: snapshot.corpus.records.length,
      endpoints: snapshot.corpus.records.map(endpointLabel),
      sample_endpoint: snapshot.corpus.records[0] ?? null,
      metadata: snapshot.corpus.metadata,
      indexVersion: snapshot.version,
      builtAt: snapshot.builtAt,
    };
  });

  server.post("/reload", async (request: FastifyRequest, reply: FastifyReply) => {
    if (!isAuthorizedForReload(request)) {
      logger.warn("Rejected reload request", { ip: request.ip });
      return reply.code(401).send({ error: "Unauthorized" });
    }

    const result = await retrieval.reload();
    if (result.success) {
      return result;
    }

    return reply.code(result.kind === "unknown" ? 500 : 422).send(result);
  });
}
