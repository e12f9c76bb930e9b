/**
 * API Documentation Assistant - HTTP entry point
 * Loads the endpoint corpus, builds the index and serves questions about it
 */

import { config } from "dotenv";
import { getRankingConfig, loadConfig } from "./src/config.js";
import { createCorpusSource } from "./src/corpus/sources.js";
import { errorMessage, LoadError } from "./src/errors.js";
import { createAnswerGenerator } from "./src/llm/chat-completion-client.js";
import { logger } from "./src/logger.js";
import { AnswerService } from "./src/services/answer-service.js";
import { RetrievalService } from "./src/services/retrieval-service.js";
import { buildServer } from "./src/web/app.js";

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || "development";
const envFile =
  nodeEnv === "production" ? ".env.production" : ".env.development";
config({ path: envFile });

const appConfig = loadConfig();

logger.info("Environment configuration loaded", {
  nodeEnv,
  envFile,
  corpusSource: appConfig.CORPUS_SOURCE,
  llmProvider: appConfig.LLM_PROVIDER,
});

const start = async () => {
  let retrieval: RetrievalService;
  try {
    retrieval = await RetrievalService.create(createCorpusSource(appConfig), {
      resultCount: appConfig.RESULT_COUNT,
      maxResultCount: appConfig.MAX_RESULT_COUNT,
      maxContextLength: appConfig.MAX_CONTEXT_LENGTH,
      ranking: getRankingConfig(appConfig),
      strict: appConfig.CORPUS_STRICT,
    });
  } catch (error) {
    logger.fatal("Cannot load endpoint corpus", {
      kind: error instanceof LoadError ? error.kind : "unknown",
      error: errorMessage(error),
    });
    process.exit(1);
  }

  const answers = new AnswerService(retrieval, createAnswerGenerator(appConfig));

  const server = buildServer(
    { config: appConfig, retrieval, answers },
    {
      logger:
        appConfig.NODE_ENV === "production"
          ? {
              level: "info",
              redact: ["req.headers.authorization"],
            }
          : {
              level: "debug",
              transport: {
                target: "pino-pretty",
                options: { colorize: true },
              },
            },
      trustProxy: true,
      keepAliveTimeout: 30000,
      requestTimeout: 60000,
    }
  );

  const gracefulShutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, initiating graceful shutdown`);

    try {
      await server.close();
      await retrieval.close();
      server.log.info("Server closed successfully");
      process.exit(0);
    } catch (error) {
      server.log.error(error, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled Rejection", {
      reason: errorMessage(reason),
    });
    process.exit(1);
  });

  try {
    await server.listen({ port: appConfig.PORT, host: appConfig.HOST });

    const snapshot = retrieval.snapshot();
    const startupMessage = `API documentation assistant started
Listening on http://${appConfig.HOST}:${appConfig.PORT}
Environment: ${appConfig.NODE_ENV}
Corpus: ${snapshot.corpus.metadata.source} (${snapshot.corpus.metadata.count} endpoints, ${snapshot.corpus.metadata.skipped} skipped)
Answer generation: ${answers.hasGenerator() ? appConfig.LLM_PROVIDER : "disabled (retrieval only)"}`;

    startupMessage.split("\n").forEach((line) => server.log.info(line));
  } catch (error) {
    server.log.fatal(error, "Failed to start server");
    process.exit(1);
  }
};

void start();
