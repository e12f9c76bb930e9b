import { loadCorpus } from "../corpus/loader.js";
import type { CorpusSource } from "../corpus/sources.js";
import type { Corpus } from "../types/corpus.js";

/**
 * Two-endpoint corpus used throughout the ranking tests
 */
export const TICKET_ENTRIES = [
  { method: "POST", path: "/tickets", description: "Create a new ticket" },
  { method: "GET", path: "/tickets/{id}", description: "Get ticket details" },
];

export function corpusOf(entries: readonly unknown[]): Corpus {
  return loadCorpus(entries, { source: "test" });
}

/**
 * Corpus source whose entries can be replaced between loads
 */
export class InMemoryCorpusSource implements CorpusSource {
  loads = 0;

  constructor(public entries: unknown) {}

  describe(): string {
    return "memory";
  }

  async load(options: { strict?: boolean } = {}): Promise<Corpus> {
    this.loads++;
    return loadCorpus(this.entries, { ...options, source: this.describe() });
  }
}
