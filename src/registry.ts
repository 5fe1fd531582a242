import { randomUUID } from "node:crypto";
import { chunk, DEFAULT_CHUNK_SIZE } from "./chunker";
import { EmbeddingError, InvalidArgumentError, NotFoundError, describeError } from "./errors";
import type { EmbeddingProvider } from "./embeddings";
import { SerialQueue } from "./serial-queue";
import type { Document, DocumentType, MemoryStatistics, VectorEntry } from "./types";
import { normalizeEmbedding } from "./vector-math";
import { VectorIndex, type BatchEntry } from "./vector-index";

/** A committed document together with the texts of its chunks. */
export interface DocumentRecord {
  readonly document: Document;
  readonly chunks: readonly string[];
}

export interface RegistryOptions {
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  chunkSize?: number;
  /** Id allocator; defaults to random UUIDs. Must never repeat. */
  generateId?: () => string;
  /** Clock used for `createdAt`. */
  now?: () => Date;
  verbose?: boolean;
}

export interface IndexTextOptions {
  type?: DocumentType;
  signal?: AbortSignal;
}

/**
 * Owns document identity and chunk bookkeeping, and keeps the vector index in
 * step with it. Chunking and embedding run without holding anything; only the
 * final commit (vector batch + document record) goes through the single-writer
 * queue, and that commit is one synchronous block so readers see the document
 * either completely or not at all.
 */
export class DocumentRegistry {
  private readonly index: VectorIndex;
  private readonly embeddings: EmbeddingProvider;
  private readonly chunkSize: number;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly verbose: boolean;
  private readonly writes = new SerialQueue();
  private records = new Map<string, DocumentRecord>();
  private closed = false;

  public constructor(opts: RegistryOptions) {
    this.index = opts.index;
    this.embeddings = opts.embeddings;
    this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.generateId = opts.generateId ?? randomUUID;
    this.now = opts.now ?? (() => new Date());
    this.verbose = !!opts.verbose;
    // Fail fast on a bad chunk size instead of at the first indexing call.
    chunk("", this.chunkSize);
  }

  public getChunkSize(): number {
    return this.chunkSize;
  }

  /**
   * Chunk, embed and commit a document's text.
   *
   * @throws {InvalidArgumentError} Vector dimension differs from the index's.
   * @throws {EmbeddingError} Provider failure or an unnormalizable vector.
   * Aborting via `signal` rejects with the signal's reason. In every failure
   * case nothing is committed.
   */
  public async indexText(source: string, text: string, opts: IndexTextOptions = {}): Promise<Document> {
    const { signal } = opts;
    signal?.throwIfAborted();
    const chunks = chunk(text, this.chunkSize);

    const batch: BatchEntry[] = [];
    for (let i = 0; i < chunks.length; i++) {
      signal?.throwIfAborted();
      const embedding = await this.embedChunk(chunks[i], signal);
      const expected = this.index.dimension ?? this.embeddings.dimension;
      if (embedding.length !== expected) {
        throw new InvalidArgumentError(
          `Embedding dimension ${embedding.length} does not match index dimension ${expected}`,
        );
      }
      batch.push({ chunkIndex: i, embedding });
      if (this.verbose && (i + 1) % 50 === 0) {
        console.error(`[memory][verbose] Embedded ${i + 1}/${chunks.length} chunks of ${source}`);
      }
    }

    return this.write(() => {
      signal?.throwIfAborted();
      const document: Document = {
        id: this.generateId(),
        source,
        type: opts.type ?? "text",
        chunkCount: batch.length,
        createdAt: this.now().toISOString(),
      };
      if (this.records.has(document.id)) {
        throw new InvalidArgumentError(`Document id ${document.id} is already in use`);
      }
      this.index.insertBatch(document.id, batch);
      this.records.set(document.id, { document, chunks });
      return document;
    });
  }

  /** @returns false (and changes nothing) when the id is unknown. */
  public deleteDocument(documentId: string): Promise<boolean> {
    return this.write(() => {
      if (!this.records.has(documentId)) return false;
      this.index.deleteDocument(documentId);
      this.records.delete(documentId);
      return true;
    });
  }

  /** @throws {NotFoundError} */
  public getDocument(documentId: string): Document {
    const record = this.records.get(documentId);
    if (!record) throw new NotFoundError(documentId);
    return record.document;
  }

  public findDocument(documentId: string): Document | undefined {
    return this.records.get(documentId)?.document;
  }

  /** Documents in commit order. */
  public listDocuments(): Document[] {
    return Array.from(this.records.values(), (r) => r.document);
  }

  /** All records, for snapshotting. */
  public listRecords(): DocumentRecord[] {
    return Array.from(this.records.values());
  }

  public chunkText(documentId: string, chunkIndex: number): string | undefined {
    return this.records.get(documentId)?.chunks[chunkIndex];
  }

  public statistics(): MemoryStatistics {
    const documentTypes: Record<DocumentType, number> = { text: 0, pdf: 0, image: 0, audio: 0 };
    for (const { document } of this.records.values()) documentTypes[document.type]++;
    return {
      totalDocuments: this.records.size,
      totalChunks: this.index.size,
      documentTypes,
      dimension: this.index.dimension,
    };
  }

  /**
   * Replace registry and index contents with restored state. Rejects records
   * whose chunk count or chunk texts disagree with their vector entries.
   */
  public restore(
    records: readonly DocumentRecord[],
    entries: readonly VectorEntry[],
    dimension: number,
  ): Promise<void> {
    return this.write(() => {
      const counts = new Map<string, number>();
      for (const e of entries) counts.set(e.documentId, (counts.get(e.documentId) ?? 0) + 1);
      const next = new Map<string, DocumentRecord>();
      for (const r of records) {
        const { id, chunkCount } = r.document;
        if (next.has(id)) throw new InvalidArgumentError(`Duplicate document id ${id} in snapshot`);
        const live = counts.get(id) ?? 0;
        if (live !== chunkCount || r.chunks.length !== chunkCount) {
          throw new InvalidArgumentError(
            `Document ${id} declares ${chunkCount} chunks but has ${live} vectors and ${r.chunks.length} texts`,
          );
        }
        next.set(id, r);
      }
      for (const e of entries) {
        const owner = next.get(e.documentId);
        if (!owner) throw new InvalidArgumentError(`Vectors reference unknown document ${e.documentId}`);
        if (e.chunkIndex >= owner.chunks.length) {
          throw new InvalidArgumentError(`Chunk index ${e.chunkIndex} out of range for document ${e.documentId}`);
        }
      }
      this.index.load(entries, dimension);
      this.records = next;
    });
  }

  public clear(): Promise<void> {
    return this.write(() => {
      this.index.clear();
      this.records = new Map();
    });
  }

  /** Resolves once every queued mutation has settled. */
  public idle(): Promise<void> {
    return this.writes.idle();
  }

  /**
   * Refuse every mutation that reaches the write queue from now on, including
   * an in-flight {@link indexText} that is still embedding. Reads keep working.
   */
  public close(): void {
    this.closed = true;
  }

  private write<T>(task: () => T): Promise<T> {
    return this.writes.run(() => {
      if (this.closed) throw new Error("Document registry is closed");
      return task();
    });
  }

  private async embedChunk(text: string, signal?: AbortSignal): Promise<Float32Array> {
    let raw: ArrayLike<number>;
    try {
      raw = await this.embeddings.embed(text, signal);
    } catch (e) {
      signal?.throwIfAborted();
      throw new EmbeddingError(`Embedding provider failed: ${describeError(e)}`, { cause: e });
    }
    return normalizeEmbedding(raw);
  }
}
