import { InvalidArgumentError } from "./errors";
import { dot, isUnitNorm } from "./vector-math";
import type { SearchHit, VectorEntry } from "./types";

/** Entry as handed to {@link VectorIndex.insertBatch}, before it is bound to a document. */
export interface BatchEntry {
  chunkIndex: number;
  embedding: Float32Array;
}

/**
 * In-memory vector store with an exact (linear scan) cosine search.
 *
 * State is copy-on-write: every mutation builds a new entry array and a new
 * `documentId → entries` map, then swaps both references at once. A search
 * reads whichever pair is current when it starts, so it never observes half a
 * document. Mutations are synchronous and validate everything before
 * publishing, which makes each one all-or-nothing.
 */
export class VectorIndex {
  private entries: readonly VectorEntry[] = [];
  private byDocument: ReadonlyMap<string, readonly VectorEntry[]> = new Map();
  private dim: number | undefined;

  /** @param dimension Fix D up front; otherwise the first inserted batch fixes it. */
  public constructor(dimension?: number) {
    if (dimension !== undefined) VectorIndex.assertDimension(dimension);
    this.dim = dimension;
  }

  public get dimension(): number | undefined {
    return this.dim;
  }

  /** Number of live entries. */
  public get size(): number {
    return this.entries.length;
  }

  /** Documents that own at least one live entry. */
  public get documentCount(): number {
    return this.byDocument.size;
  }

  public hasDocument(documentId: string): boolean {
    return this.byDocument.has(documentId);
  }

  /** Entries of one document in chunk order (empty for unknown ids). */
  public entriesFor(documentId: string): readonly VectorEntry[] {
    return this.byDocument.get(documentId) ?? [];
  }

  /** Current snapshot of every live entry. */
  public allEntries(): readonly VectorEntry[] {
    return this.entries;
  }

  /**
   * Publish all entries of a document at once. An empty batch publishes
   * nothing, so a document appears here only while it owns entries.
   *
   * @throws {InvalidArgumentError} On a dimension mismatch, a non-unit vector,
   *   a duplicate or negative chunk index, or a document already present.
   *   Nothing is published in that case.
   */
  public insertBatch(documentId: string, batch: readonly BatchEntry[]): void {
    if (this.byDocument.has(documentId)) {
      throw new InvalidArgumentError(`Document ${documentId} already has vectors in the index`);
    }
    if (batch.length === 0) return;
    const dimension = this.dim ?? batch[0]?.embedding.length;
    const seen = new Set<number>();
    const added: VectorEntry[] = [];
    for (const { chunkIndex, embedding } of batch) {
      if (!Number.isInteger(chunkIndex) || chunkIndex < 0 || seen.has(chunkIndex)) {
        throw new InvalidArgumentError(
          `Invalid or duplicate chunk index ${chunkIndex} for document ${documentId}`,
        );
      }
      if (embedding.length !== dimension) {
        throw new InvalidArgumentError(
          `Embedding dimension ${embedding.length} does not match index dimension ${dimension}`,
        );
      }
      if (!isUnitNorm(embedding)) {
        throw new InvalidArgumentError(`Embedding for chunk ${chunkIndex} is not unit-normalized`);
      }
      seen.add(chunkIndex);
      added.push({ documentId, chunkIndex, embedding });
    }
    added.sort((a, b) => a.chunkIndex - b.chunkIndex);

    const nextByDocument = new Map(this.byDocument);
    nextByDocument.set(documentId, added);
    if (dimension !== undefined) this.dim = dimension;
    this.entries = [...this.entries, ...added];
    this.byDocument = nextByDocument;
  }

  /**
   * Remove every entry of a document. Idempotent.
   * @returns Number of entries removed (0 for an absent id).
   */
  public deleteDocument(documentId: string): number {
    const existing = this.byDocument.get(documentId);
    if (!existing) return 0;
    const nextByDocument = new Map(this.byDocument);
    nextByDocument.delete(documentId);
    this.entries = this.entries.filter((e) => e.documentId !== documentId);
    this.byDocument = nextByDocument;
    return existing.length;
  }

  /**
   * Exact top-k cosine search (dot product of unit vectors) over the current
   * snapshot. Ordered by score descending, ties by document id then chunk
   * index ascending.
   *
   * @param query Unit-normalized query vector.
   * @param topK Non-negative integer.
   * @param predicate Optional document filter applied before ranking.
   */
  public search(
    query: Float32Array,
    topK: number,
    predicate?: (documentId: string) => boolean,
  ): SearchHit[] {
    if (!Number.isInteger(topK) || topK < 0) {
      throw new InvalidArgumentError(`top_k must be a non-negative integer (got ${topK})`);
    }
    const snapshot = this.entries;
    if (topK === 0 || snapshot.length === 0) return [];
    if (this.dim !== undefined && query.length !== this.dim) {
      throw new InvalidArgumentError(
        `Query dimension ${query.length} does not match index dimension ${this.dim}`,
      );
    }

    const scored: SearchHit[] = [];
    for (const e of snapshot) {
      if (predicate && !predicate(e.documentId)) continue;
      scored.push({ documentId: e.documentId, chunkIndex: e.chunkIndex, score: dot(query, e.embedding) });
    }
    scored.sort(compareHits);
    return scored.slice(0, topK);
  }

  /**
   * Replace the whole state, used when restoring a snapshot. Validates the
   * same way {@link insertBatch} does.
   */
  public load(entries: readonly VectorEntry[], dimension: number): void {
    VectorIndex.assertDimension(dimension);
    const grouped = new Map<string, BatchEntry[]>();
    for (const e of entries) {
      let arr = grouped.get(e.documentId);
      if (!arr) {
        arr = [];
        grouped.set(e.documentId, arr);
      }
      arr.push({ chunkIndex: e.chunkIndex, embedding: e.embedding });
    }
    const staged = new VectorIndex(dimension);
    for (const [documentId, batch] of grouped) staged.insertBatch(documentId, batch);
    this.dim = dimension;
    this.entries = staged.entries;
    this.byDocument = staged.byDocument;
  }

  /** Drop every entry. The dimension stays fixed. */
  public clear(): void {
    this.entries = [];
    this.byDocument = new Map();
  }

  private static assertDimension(dimension: number): void {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidArgumentError(`Embedding dimension must be a positive integer (got ${dimension})`);
    }
  }
}

/** Score descending, then (documentId, chunkIndex) ascending. */
export function compareHits(
  a: { documentId: string; chunkIndex: number; score: number },
  b: { documentId: string; chunkIndex: number; score: number },
): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.chunkIndex - b.chunkIndex;
}
