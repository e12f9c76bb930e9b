/**
 * Retrieval Service
 *
 * Owns the index handle and runs the per-query pipeline:
 * analyze → rank → assemble. Every query reads the handle exactly once.
 * Reloads build a complete new index off to the side and publish it with
 * a single swap; a failed reload leaves the current index in place.
 */

import { errorMessage, type LoadErrorKind, LoadError } from "../errors.js";
import { logger } from "../logger.js";
import { analyze } from "../search/analyzer.js";
import { assemble } from "../search/context-assembler.js";
import { buildIndex, DEFAULT_RANKING_CONFIG } from "../search/indexer.js";
import { rank } from "../search/ranker.js";
import type { CorpusMetadata } from "../types/corpus.js";
import type { RankingConfig, RetrievalResponse } from "../types/retrieval.js";
import type { CorpusSource } from "../corpus/sources.js";
import { IndexHandle, type IndexSnapshot } from "./index-handle.js";

export interface RetrievalSettings {
  readonly resultCount: number;
  readonly maxResultCount: number;
  readonly maxContextLength: number;
  readonly ranking: RankingConfig;
  readonly strict: boolean;
}

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  resultCount: 5,
  maxResultCount: 20,
  maxContextLength: 6000,
  ranking: DEFAULT_RANKING_CONFIG,
  strict: false,
};

export interface RetrievalOptions {
  readonly k?: number;
  readonly maxContextLength?: number;
}

export interface VersionedRetrieval extends RetrievalResponse {
  readonly indexVersion: number;
}

export type ReloadResult =
  | {
      readonly success: true;
      readonly version: number;
      readonly metadata: CorpusMetadata;
    }
  | {
      readonly success: false;
      readonly version: number;
      readonly kind: LoadErrorKind | "unknown";
      readonly error: string;
    };

export class RetrievalService {
  private reloadPromise: Promise<ReloadResult> | null = null;

  constructor(
    private readonly handle: IndexHandle,
    private readonly source: CorpusSource,
    private readonly settings: RetrievalSettings = DEFAULT_RETRIEVAL_SETTINGS
  ) {}

  /**
   * Load the corpus and build the first index. A LoadError here is fatal to
   * the caller.
   */
  static async create(
    source: CorpusSource,
    settings: RetrievalSettings = DEFAULT_RETRIEVAL_SETTINGS
  ): Promise<RetrievalService> {
    const corpus = await source.load({ strict: settings.strict });
    const handle = new IndexHandle(buildIndex(corpus, settings.ranking));
    return new RetrievalService(handle, source, settings);
  }

  snapshot(): IndexSnapshot {
    return this.handle.current();
  }

  retrieve(rawQuery: string, options: RetrievalOptions = {}): VersionedRetrieval {
    const startTime = Date.now();
    const snapshot = this.handle.current();

    const k = Math.min(
      options.k ?? this.settings.resultCount,
      this.settings.maxResultCount
    );
    const maxContextLength =
      options.maxContextLength ?? this.settings.maxContextLength;

    const query = analyze(rawQuery);
    const ranked = rank(snapshot.index, query, k);
    const response = assemble(snapshot.index, query, ranked, maxContextLength);

    logger.query("retrieved", {
      terms: query.terms.length,
      ranked: ranked.length,
      results: response.results.length,
      omitted: response.omitted,
      topScore: ranked[0]?.score ?? 0,
      indexVersion: snapshot.version,
      searchTime: Date.now() - startTime,
    });

    return { ...response, indexVersion: snapshot.version };
  }

  /**
   * Rebuild from the corpus source. Concurrent callers share one reload.
   */
  reload(): Promise<ReloadResult> {
    if (this.reloadPromise) return this.reloadPromise;

    this.reloadPromise = this.performReload().finally(() => {
      this.reloadPromise = null;
    });
    return this.reloadPromise;
  }

  private async performReload(): Promise<ReloadResult> {
    const startTime = Date.now();
    logger.corpus("reload started", { source: this.source.describe() });

    try {
      const corpus = await this.source.load({ strict: this.settings.strict });
      const next = this.handle.swap(buildIndex(corpus, this.settings.ranking));

      logger.corpus("reload completed", {
        version: next.version,
        count: corpus.metadata.count,
        skipped: corpus.metadata.skipped,
        reloadTime: Date.now() - startTime,
      });

      return { success: true, version: next.version, metadata: corpus.metadata };
    } catch (error) {
      const kept = this.handle.current().version;
      const message = errorMessage(error);

      logger.error("Corpus reload failed, keeping current index", {
        error: message,
        keptVersion: kept,
      });

      return {
        success: false,
        version: kept,
        kind: error instanceof LoadError ? error.kind : "unknown",
        error: message,
      };
    }
  }

  async close(): Promise<void> {
    await this.source.close?.();
  }
}
