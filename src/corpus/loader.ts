/**
 * Corpus Loader
 *
 * Turns the scraper's output (a bare array of endpoint objects, or the
 * `{ base_url, endpoints, scraped_at }` wrapper) into an immutable Corpus.
 * Malformed entries are skipped and counted unless `strict` is set, in which
 * case the first one aborts the load.
 */

import { errorMessage, LoadError } from "../errors.js";
import { logger } from "../logger.js";
import type {
  Corpus,
  EndpointRecord,
  SkippedEntry,
} from "../types/corpus.js";
import {
  describeIssues,
  endpointEntrySchema,
  scrapedDocumentationSchema,
} from "./schema.js";

export interface LoadOptions {
  /** Abort on the first malformed or duplicate entry */
  readonly strict?: boolean;
  /** Label recorded in the metadata, e.g. a file path */
  readonly source?: string;
}

interface Collection {
  readonly entries: readonly unknown[];
  readonly baseUrl?: string;
  readonly sourceTimestamp?: string;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function toCollection(input: unknown): Collection {
  if (Array.isArray(input)) {
    return { entries: input };
  }

  const wrapper = scrapedDocumentationSchema.safeParse(input);
  if (wrapper.success) {
    return {
      entries: wrapper.data.endpoints,
      baseUrl: wrapper.data.base_url,
      sourceTimestamp: wrapper.data.scraped_at,
    };
  }

  throw LoadError.malformed(
    "Corpus must be an array of endpoint objects or an object with an `endpoints` array"
  );
}

/**
 * Validate a structured collection and build the in-memory corpus
 */
export function loadCorpus(input: unknown, options: LoadOptions = {}): Corpus {
  const startTime = Date.now();
  const { strict = false, source = "inline" } = options;
  const collection = toCollection(input);

  const records: EndpointRecord[] = [];
  const skippedEntries: SkippedEntry[] = [];
  const seen = new Set<string>();

  const reject = (index: number, reason: string): void => {
    if (strict) {
      throw LoadError.malformed(`Entry ${index} rejected: ${reason}`, index);
    }
    logger.warn("Skipping corpus entry", { index, reason });
    skippedEntries.push({ index, reason });
  };

  collection.entries.forEach((entry, index) => {
    if (!isPlainObject(entry)) {
      reject(index, "entry is not an object");
      return;
    }

    const parsed = endpointEntrySchema.safeParse(entry);
    if (!parsed.success) {
      reject(index, describeIssues(parsed.error));
      return;
    }

    const record = parsed.data;
    const key = `${record.method} ${record.path}`;
    if (seen.has(key)) {
      reject(index, `duplicate endpoint ${key}`);
      return;
    }

    seen.add(key);
    records.push(record);
  });

  if (records.length === 0) {
    throw LoadError.empty(
      `No valid endpoints in corpus (${collection.entries.length} entries, ${skippedEntries.length} skipped)`
    );
  }

  const corpus: Corpus = Object.freeze({
    records: Object.freeze(records),
    metadata: Object.freeze({
      source,
      loadedAt: new Date().toISOString(),
      ...(collection.sourceTimestamp !== undefined && {
        sourceTimestamp: collection.sourceTimestamp,
      }),
      ...(collection.baseUrl !== undefined && { baseUrl: collection.baseUrl }),
      count: records.length,
      skipped: skippedEntries.length,
      skippedEntries: Object.freeze(skippedEntries),
    }),
  });

  logger.corpus("loaded", {
    source,
    count: records.length,
    skipped: skippedEntries.length,
    loadTime: Date.now() - startTime,
  });

  return corpus;
}

/**
 * Parse raw JSON text, then load it
 */
export function parseCorpus(text: string, options: LoadOptions = {}): Corpus {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw LoadError.malformed(
      `Corpus is not valid JSON: ${errorMessage(error)}`
    );
  }
  return loadCorpus(input, options);
}
