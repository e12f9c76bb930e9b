/**
 * Swappable handle on the current corpus and index
 *
 * A snapshot is immutable. Publishing a new one is a single reference
 * assignment, so a reader that took `current()` keeps a complete, consistent
 * view for as long as it holds it.
 */

import type { Corpus } from "../types/corpus.js";
import type { SearchIndex } from "../types/retrieval.js";

export interface IndexSnapshot {
  readonly version: number;
  readonly builtAt: string;
  readonly corpus: Corpus;
  readonly index: SearchIndex;
}

export class IndexHandle {
  private snapshot: IndexSnapshot;

  constructor(index: SearchIndex) {
    this.snapshot = IndexHandle.snapshotOf(index, 1);
  }

  private static snapshotOf(index: SearchIndex, version: number): IndexSnapshot {
    return Object.freeze({
      version,
      builtAt: new Date().toISOString(),
      corpus: index.corpus,
      index,
    });
  }

  current(): IndexSnapshot {
    return this.snapshot;
  }

  /**
   * Publish a new index and return its snapshot
   */
  swap(index: SearchIndex): IndexSnapshot {
    const next = IndexHandle.snapshotOf(index, this.snapshot.version + 1);
    this.snapshot = next;
    return next;
  }
}
