/**
 * Error types raised by the corpus loader and the LLM client
 */

export type LoadErrorKind = "malformed" | "empty";

export class LoadError extends Error {
  readonly kind: LoadErrorKind;
  /** Position of the offending entry, when a single entry caused the failure */
  readonly entryIndex?: number;

  constructor(kind: LoadErrorKind, message: string, entryIndex?: number) {
    super(message);
    this.name = "LoadError";
    this.kind = kind;
    this.entryIndex = entryIndex;
  }

  static malformed(message: string, entryIndex?: number): LoadError {
    return new LoadError("malformed", message, entryIndex);
  }

  static empty(message: string): LoadError {
    return new LoadError("empty", message);
  }
}

export class LlmError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable: boolean }) {
    super(message);
    this.name = "LlmError";
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
