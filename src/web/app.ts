/**
 * Fastify application factory
 * Kept separate from the process entry point so routes can be exercised
 * in-process with `inject`.
 */

import { fastify, type FastifyInstance, type FastifyServerOptions } from "fastify";
import { logger } from "../logger.js";
import { type RouteDependencies, registerRoutes } from "./routes.js";

export function buildServer(
  deps: RouteDependencies,
  options: FastifyServerOptions = { logger: false }
): FastifyInstance {
  const server = fastify({
    bodyLimit: 1048576, // 1MB limit
    ...options,
  });

  server.addHook("onRequest", async (request, reply) => {
    logger.request(request.method, request.url, { ip: request.ip });

    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Referrer-Policy", "strict-origin-when-cross-origin");
  });

  server.options("*", async (_request, reply) => {
    return reply.code(204).send();
  });

  server.setErrorHandler(async (error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }

    logger.error("Request failed", {
      method: request.method,
      url: request.url,
      error: error.message,
      stack: error.stack,
    });
    return reply.code(500).send({ error: "Internal server error" });
  });

  registerRoutes(server, deps);

  return server;
}
