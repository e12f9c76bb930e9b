/**
 * Type-Safe Configuration Interface
 * Immutable configuration for the documentation question-answering server
 */
export type LlmProvider = "none" | "openai" | "groq";

export interface AppConfig {
  // Server Configuration
  readonly PORT: number;
  readonly HOST: string;
  readonly NODE_ENV: "development" | "production";

  // Corpus Configuration
  readonly CORPUS_SOURCE: "file" | "postgres";
  readonly CORPUS_PATH: string;
  readonly CORPUS_STRICT: boolean;

  // Database Configuration (postgres corpus source only)
  readonly CORPUS_DB_HOST: string;
  readonly CORPUS_DB_PORT: number;
  readonly CORPUS_DB_DATABASE: string;
  readonly CORPUS_DB_USER: string;
  readonly CORPUS_DB_PASSWORD: string;
  readonly CORPUS_DB_SSLMODE: "disable" | "require";

  // Retrieval Configuration
  readonly RESULT_COUNT: number;
  readonly MAX_RESULT_COUNT: number;
  readonly MAX_CONTEXT_LENGTH: number;
  readonly MAX_QUERY_LENGTH: number;

  // Ranking Configuration
  readonly WEIGHT_PATH: number;
  readonly WEIGHT_NAME: number;
  readonly WEIGHT_DESCRIPTION: number;
  readonly WEIGHT_PARAMETERS: number;
  readonly WEIGHT_TAGS: number;
  readonly PATH_MATCH_BONUS: number;
  readonly FULL_COVERAGE_BONUS: number;

  // LLM Configuration
  readonly LLM_PROVIDER: LlmProvider;
  readonly LLM_API_KEY: string;
  readonly LLM_BASE_URL?: string;
  readonly LLM_MODEL?: string;
  readonly LLM_TIMEOUT: number;
  readonly LLM_MAX_RETRIES: number;
  readonly LLM_TEMPERATURE: number;
  readonly LLM_MAX_TOKENS: number;

  // Security Configuration
  readonly RELOAD_TOKEN?: string;
}
