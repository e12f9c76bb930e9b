/**
 * Chat Completion Client
 * Answer generation over OpenAI-compatible `/chat/completions` APIs
 * (OpenAI, Groq) with per-request timeout and exponential backoff.
 */

import { z } from "zod";
import { errorMessage, LlmError } from "../errors.js";
import { logger } from "../logger.js";
import type { AppConfig } from "../types/env.js";
import { buildAnswerPrompt, SYSTEM_PROMPT } from "./prompts.js";

export interface AnswerGenerator {
  generateAnswer(
    query: string,
    context: string,
    signal?: AbortSignal
  ): Promise<string>;
}

export interface ChatCompletionConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly retryBaseDelayMs?: number;
  readonly retryMaxDelayMs?: number;
}

export const PROVIDER_DEFAULTS = {
  openai: { baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini" },
  groq: {
    baseUrl: "https://api.groq.com/openai/v1",
    model: "llama-3.3-70b-versatile",
  },
} as const;

export const EMPTY_ANSWER = "Sorry, I couldn't generate an answer.";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

export class ChatCompletionClient implements AnswerGenerator {
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;

  constructor(private readonly config: ChatCompletionConfig) {
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 500;
    this.retryMaxDelayMs = config.retryMaxDelayMs ?? 8000;
  }

  async generateAnswer(
    query: string,
    context: string,
    signal?: AbortSignal
  ): Promise<string> {
    const startTime = Date.now();
    const payload = {
      model: this.config.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildAnswerPrompt(query, context) },
      ],
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      stream: false,
    };

    let lastError: LlmError | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new LlmError("Answer generation cancelled", { retryable: false });
      }

      try {
        const answer = await this.complete(payload, signal);
        logger.info("Answer generated", {
          model: this.config.model,
          attempts: attempt + 1,
          generationTime: Date.now() - startTime,
        });
        return answer;
      } catch (error) {
        lastError =
          error instanceof LlmError
            ? error
            : new LlmError(
                `LLM request failed: ${errorMessage(error)}`,
                { retryable: true }
              );

        if (!lastError.retryable || attempt === this.config.maxRetries) {
          break;
        }

        const delay = Math.min(
          this.retryBaseDelayMs * 2 ** attempt,
          this.retryMaxDelayMs
        );
        logger.warn("LLM request failed, retrying", {
          attempt: attempt + 1,
          status: lastError.status,
          delay,
        });
        await this.sleep(delay);
      }
    }

    throw lastError ?? new LlmError("LLM request failed", { retryable: false });
  }

  private async complete(
    payload: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "Unknown error");
        throw new LlmError(`LLM API error ${response.status}: ${errorText}`, {
          status: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      const parsed = chatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new LlmError("LLM API returned an unexpected response shape", {
          retryable: false,
        });
      }

      const answer = parsed.data.choices[0].message.content?.trim();
      return answer ? answer : EMPTY_ANSWER;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Build the configured generator, or null when answer generation is off
 */
export function createAnswerGenerator(config: AppConfig): AnswerGenerator | null {
  if (config.LLM_PROVIDER === "none") return null;

  const defaults = PROVIDER_DEFAULTS[config.LLM_PROVIDER];
  return new ChatCompletionClient({
    baseUrl: (config.LLM_BASE_URL ?? defaults.baseUrl).replace(/\/+$/, ""),
    apiKey: config.LLM_API_KEY,
    model: config.LLM_MODEL ?? defaults.model,
    timeoutMs: config.LLM_TIMEOUT * 1000,
    maxRetries: config.LLM_MAX_RETRIES,
    temperature: config.LLM_TEMPERATURE,
    maxTokens: config.LLM_MAX_TOKENS,
  });
}
