/**
 * Configuration Management
 * Environment-aware configuration with validation
 */

import type { RankingConfig } from "./types/retrieval.js";
import type { AppConfig, LlmProvider } from "./types/env.js";

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Load and validate application configuration
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const errors: string[] = [];

  const pick = <T extends string>(
    field: string,
    allowed: readonly T[],
    fallback: T
  ): T => {
    const raw = env[field];
    if (raw === undefined || raw === "") return fallback;
    const match = allowed.find((value) => value === raw);
    if (match === undefined) {
      errors.push(
        `Invalid ${field}: ${raw}. Must be one of ${allowed.join(", ")}.`
      );
      return fallback;
    }
    return match;
  };

  const config: AppConfig = {
    // Server Configuration
    PORT: parseInt(env.PORT || "3001", 10),
    HOST: env.HOST || "0.0.0.0",
    NODE_ENV: pick("NODE_ENV", ["development", "production"], "development"),

    // Corpus Configuration
    CORPUS_SOURCE: pick("CORPUS_SOURCE", ["file", "postgres"], "file"),
    CORPUS_PATH: env.CORPUS_PATH || "data/documentation.json",
    CORPUS_STRICT: env.CORPUS_STRICT === "true",

    // Database Configuration (postgres corpus source only)
    CORPUS_DB_HOST: env.CORPUS_DB_HOST || "localhost",
    CORPUS_DB_PORT: parseInt(env.CORPUS_DB_PORT || "5432", 10),
    CORPUS_DB_DATABASE: env.CORPUS_DB_DATABASE || "api_docs",
    CORPUS_DB_USER: env.CORPUS_DB_USER || "api_docs",
    CORPUS_DB_PASSWORD: env.CORPUS_DB_PASSWORD || "password",
    CORPUS_DB_SSLMODE: pick("CORPUS_DB_SSLMODE", ["disable", "require"], "disable"),

    // Retrieval Configuration
    RESULT_COUNT: parseInt(env.RESULT_COUNT || "5", 10),
    MAX_RESULT_COUNT: parseInt(env.MAX_RESULT_COUNT || "20", 10),
    MAX_CONTEXT_LENGTH: parseInt(env.MAX_CONTEXT_LENGTH || "6000", 10),
    MAX_QUERY_LENGTH: parseInt(env.MAX_QUERY_LENGTH || "1000", 10),

    // Ranking Configuration
    WEIGHT_PATH: parseFloat(env.WEIGHT_PATH || "3.0"),
    WEIGHT_NAME: parseFloat(env.WEIGHT_NAME || "2.0"),
    WEIGHT_DESCRIPTION: parseFloat(env.WEIGHT_DESCRIPTION || "1.5"),
    WEIGHT_PARAMETERS: parseFloat(env.WEIGHT_PARAMETERS || "1.0"),
    WEIGHT_TAGS: parseFloat(env.WEIGHT_TAGS || "0.5"),
    PATH_MATCH_BONUS: parseFloat(env.PATH_MATCH_BONUS || "2.0"),
    FULL_COVERAGE_BONUS: parseFloat(env.FULL_COVERAGE_BONUS || "1.0"),

    // LLM Configuration
    LLM_PROVIDER: pick<LlmProvider>(
      "LLM_PROVIDER",
      ["none", "openai", "groq"],
      "none"
    ),
    LLM_API_KEY: env.LLM_API_KEY || "",
    LLM_BASE_URL: env.LLM_BASE_URL || undefined,
    LLM_MODEL: env.LLM_MODEL || undefined,
    LLM_TIMEOUT: parseInt(env.LLM_TIMEOUT || "30", 10),
    LLM_MAX_RETRIES: parseInt(env.LLM_MAX_RETRIES || "2", 10),
    LLM_TEMPERATURE: parseFloat(env.LLM_TEMPERATURE || "0.1"),
    LLM_MAX_TOKENS: parseInt(env.LLM_MAX_TOKENS || "1024", 10),

    // Security Configuration
    RELOAD_TOKEN: env.RELOAD_TOKEN || undefined,
  };

  validateConfig(config, errors);

  return config;
};

/**
 * Validate configuration values
 */
const validateConfig = (config: AppConfig, errors: string[]): void => {
  if (!(config.PORT >= 1 && config.PORT <= 65535)) {
    errors.push(`Invalid PORT: ${config.PORT}. Must be between 1 and 65535.`);
  }

  if (!(config.CORPUS_DB_PORT >= 1 && config.CORPUS_DB_PORT <= 65535)) {
    errors.push(
      `Invalid CORPUS_DB_PORT: ${config.CORPUS_DB_PORT}. Must be between 1 and 65535.`
    );
  }

  if (!(config.MAX_RESULT_COUNT >= 1)) {
    errors.push(
      `Invalid MAX_RESULT_COUNT: ${config.MAX_RESULT_COUNT}. Must be at least 1.`
    );
  }

  if (!(config.RESULT_COUNT >= 1 && config.RESULT_COUNT <= config.MAX_RESULT_COUNT)) {
    errors.push(
      `Invalid RESULT_COUNT: ${config.RESULT_COUNT}. Must be between 1 and MAX_RESULT_COUNT.`
    );
  }

  for (const [field, value] of [
    ["MAX_CONTEXT_LENGTH", config.MAX_CONTEXT_LENGTH],
    ["MAX_QUERY_LENGTH", config.MAX_QUERY_LENGTH],
    ["LLM_MAX_TOKENS", config.LLM_MAX_TOKENS],
  ] as const) {
    if (!(value >= 1)) {
      errors.push(`Invalid ${field}: ${value}. Must be a positive integer.`);
    }
  }

  for (const [field, value] of [
    ["WEIGHT_PATH", config.WEIGHT_PATH],
    ["WEIGHT_NAME", config.WEIGHT_NAME],
    ["WEIGHT_DESCRIPTION", config.WEIGHT_DESCRIPTION],
    ["WEIGHT_PARAMETERS", config.WEIGHT_PARAMETERS],
    ["WEIGHT_TAGS", config.WEIGHT_TAGS],
    ["PATH_MATCH_BONUS", config.PATH_MATCH_BONUS],
    ["FULL_COVERAGE_BONUS", config.FULL_COVERAGE_BONUS],
  ] as const) {
    if (!(value >= 0)) {
      errors.push(`Invalid ${field}: ${value}. Must be a number >= 0.`);
    }
  }

  if (!(config.LLM_TIMEOUT >= 1 && config.LLM_TIMEOUT <= 300)) {
    errors.push(
      `Invalid LLM_TIMEOUT: ${config.LLM_TIMEOUT}. Must be between 1 and 300 seconds.`
    );
  }

  if (!(config.LLM_MAX_RETRIES >= 0 && config.LLM_MAX_RETRIES <= 5)) {
    errors.push(
      `Invalid LLM_MAX_RETRIES: ${config.LLM_MAX_RETRIES}. Must be between 0 and 5.`
    );
  }

  if (!(config.LLM_TEMPERATURE >= 0 && config.LLM_TEMPERATURE <= 2)) {
    errors.push(
      `Invalid LLM_TEMPERATURE: ${config.LLM_TEMPERATURE}. Must be between 0 and 2.`
    );
  }

  if (config.LLM_PROVIDER !== "none" && !config.LLM_API_KEY) {
    errors.push(`LLM_API_KEY is required when LLM_PROVIDER is ${config.LLM_PROVIDER}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
  }
};

/**
 * Get database connection URL
 */
export const getDatabaseUrl = (config: AppConfig): string => {
  const {
    CORPUS_DB_HOST,
    CORPUS_DB_PORT,
    CORPUS_DB_DATABASE,
    CORPUS_DB_USER,
    CORPUS_DB_PASSWORD,
    CORPUS_DB_SSLMODE,
  } = config;

  return `postgresql://${encodeURIComponent(CORPUS_DB_USER)}:${encodeURIComponent(CORPUS_DB_PASSWORD)}@${CORPUS_DB_HOST}:${CORPUS_DB_PORT}/${CORPUS_DB_DATABASE}?sslmode=${CORPUS_DB_SSLMODE}`;
};

/**
 * Ranking constants taken from configuration
 */
export const getRankingConfig = (config: AppConfig): RankingConfig => ({
  fieldWeights: {
    path: config.WEIGHT_PATH,
    name: config.WEIGHT_NAME,
    description: config.WEIGHT_DESCRIPTION,
    parameters: config.WEIGHT_PARAMETERS,
    tags: config.WEIGHT_TAGS,
  },
  pathMatchBonus: config.PATH_MATCH_BONUS,
  fullCoverageBonus: config.FULL_COVERAGE_BONUS,
});
