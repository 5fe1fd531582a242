import path from "node:path";
import fg from "fast-glob";
import { DEFAULT_ALLOWED_EXT } from "./config";
import { InvalidArgumentError, StorageError, describeError } from "./errors";
import type { EmbeddingProvider } from "./embeddings";
import { defaultExtractors, detectDocumentType, extractText, type ExtractorMap } from "./extractors";
import { Persistence } from "./persistence";
import { QueryEngine, DEFAULT_TOP_K, type QueryOptions } from "./query-engine";
import { DocumentRegistry } from "./registry";
import { SerialQueue } from "./serial-queue";
import { StatusManager } from "./status";
import type {
  Document,
  DocumentTypeInput,
  IndexResult,
  MemoryStatistics,
  QueryMatch,
  QueryResponse,
} from "./types";
import { VectorIndex } from "./vector-index";

export interface MemoryEngineOptions {
  embeddings: EmbeddingProvider;
  /** JSON snapshot location; the engine is memory-only when omitted. */
  storePath?: string;
  chunkSize?: number;
  /** Extra or replacement extractors (e.g. OCR for images, transcription for audio). */
  extractors?: ExtractorMap;
  /** Save the snapshot after every mutation (default true when `storePath` is set). */
  autoSave?: boolean;
  generateId?: () => string;
  now?: () => Date;
  verbose?: boolean;
  status?: StatusManager;
}

export interface IndexOptions {
  signal?: AbortSignal;
}

export interface IngestOptions {
  /** Extensions without leading dot. */
  extensions?: readonly string[];
  /** Folder names skipped during discovery. */
  excludedFolders?: readonly string[];
  /** Skip files whose path already has a committed document (default true). */
  skipExisting?: boolean;
  signal?: AbortSignal;
}

export interface IngestReport {
  indexed: IndexResult[];
  skipped: string[];
  failed: Array<{ source: string; error: string }>;
}

const DEFAULT_EXCLUDED_FOLDERS = ["node_modules", ".git", "dist", "build", ".cache"];

/**
 * Explicit handle over one memory store: vector index, document registry,
 * query engine, extractors and (optionally) the on-disk snapshot. Build it with
 * {@link MemoryEngine.open} and release it with {@link MemoryEngine.close};
 * there is no shared global instance.
 */
export class MemoryEngine {
  public readonly status: StatusManager;
  private readonly embeddings: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly registry: DocumentRegistry;
  private readonly queries: QueryEngine;
  private readonly extractors: ExtractorMap;
  private readonly persistence: Persistence | undefined;
  private readonly autoSave: boolean;
  private readonly verbose: boolean;
  private readonly saves = new SerialQueue();
  /** Public operations that have started and not yet settled. */
  private readonly inFlight = new Set<Promise<unknown>>();
  private closing: Promise<void> | undefined;
  private closed = false;

  private constructor(opts: MemoryEngineOptions) {
    this.embeddings = opts.embeddings;
    this.verbose = !!opts.verbose;
    this.index = new VectorIndex();
    this.registry = new DocumentRegistry({
      index: this.index,
      embeddings: opts.embeddings,
      chunkSize: opts.chunkSize,
      generateId: opts.generateId,
      now: opts.now,
      verbose: opts.verbose,
    });
    this.queries = new QueryEngine({ registry: this.registry, index: this.index, embeddings: opts.embeddings });
    const cacheDir = opts.storePath ? path.dirname(path.resolve(opts.storePath)) : process.cwd();
    this.extractors = { ...defaultExtractors(cacheDir, this.verbose), ...opts.extractors };
    this.persistence = opts.storePath ? new Persistence(opts.storePath, this.verbose) : undefined;
    this.autoSave = opts.autoSave ?? true;
    this.status = opts.status ?? new StatusManager();
    this.status.setModel(opts.embeddings.modelName, opts.embeddings.dimension);
  }

  /**
   * Create an engine and restore the snapshot at `storePath` when one exists.
   *
   * @throws {InvalidArgumentError} Snapshot dimension differs from the provider's.
   * @throws {StorageError} Snapshot unreadable, malformed or inconsistent.
   */
  public static async open(opts: MemoryEngineOptions): Promise<MemoryEngine> {
    const engine = new MemoryEngine(opts);
    await engine.restore();
    engine.refreshTotals();
    engine.status.markReady();
    return engine;
  }

  /**
   * Extract, chunk, embed and commit one source. `type` "auto" resolves from
   * the file extension.
   *
   * @throws {ExtractionError} The extractor for the type failed or is missing.
   */
  public async indexDocument(
    source: string,
    type: DocumentTypeInput = "auto",
    opts: IndexOptions = {},
  ): Promise<IndexResult> {
    return this.guarded(async () => {
      const result = await this.indexOne(source, type, opts.signal);
      await this.autoPersist();
      return result;
    });
  }

  /** Index text that is already in memory, attributing it to `source`. */
  public async indexText(
    source: string,
    text: string,
    opts: IndexOptions & { type?: DocumentTypeInput } = {},
  ): Promise<IndexResult> {
    return this.guarded(async () => {
      const documentType = detectDocumentType(source, opts.type ?? "text");
      const document = await this.track(() =>
        this.registry.indexText(source, text, { type: documentType, signal: opts.signal }),
      );
      await this.autoPersist();
      return { documentId: document.id, chunksCreated: document.chunkCount, documentType };
    });
  }

  /**
   * Discover files under `root` and index each one with type "auto". A file
   * that fails is reported and the batch continues; an abort stops the batch
   * and rethrows. The snapshot is saved once at the end.
   */
  public ingestDirectory(root: string, opts: IngestOptions = {}): Promise<IngestReport> {
    return this.guarded(() => this.ingest(root, opts));
  }

  private async ingest(root: string, opts: IngestOptions): Promise<IngestReport> {
    const { signal, skipExisting = true } = opts;
    const extensions = (opts.extensions ?? DEFAULT_ALLOWED_EXT).map((e) => e.replace(/^\./, ""));
    const excluded = opts.excludedFolders ?? DEFAULT_EXCLUDED_FOLDERS;
    const files = await fg(
      extensions.map((ext) => `**/*.${ext}`),
      {
        cwd: root,
        absolute: true,
        dot: false,
        onlyFiles: true,
        caseSensitiveMatch: false,
        ignore: excluded.map((dir) => `**/${dir}/**`),
      },
    );
    files.sort();
    console.error(`[memory] Ingesting ${files.length} files from ${root}`);

    const existing = new Set(this.registry.listDocuments().map((d) => d.source));
    const report: IngestReport = { indexed: [], skipped: [], failed: [] };
    try {
      for (const file of files) {
        signal?.throwIfAborted();
        if (skipExisting && existing.has(file)) {
          report.skipped.push(file);
          continue;
        }
        try {
          report.indexed.push(await this.indexOne(file, "auto", signal));
        } catch (e) {
          signal?.throwIfAborted();
          console.error(`[memory] Failed to index ${file}: ${describeError(e)}`);
          report.failed.push({ source: file, error: describeError(e) });
        }
      }
    } finally {
      if (report.indexed.length) await this.autoPersist();
    }
    console.error(
      `[memory] Ingestion complete. Indexed: ${report.indexed.length}, skipped: ${report.skipped.length}, failed: ${report.failed.length}`,
    );
    return report;
  }

  /**
   * Top-k semantic search. An empty corpus yields `status: "empty"` rather
   * than an error.
   */
  public async query(
    text: string,
    topK: number = DEFAULT_TOP_K,
    opts: Omit<QueryOptions, "topK"> = {},
  ): Promise<QueryResponse> {
    this.ensureOpen();
    return this.queries.query(text, { ...opts, topK });
  }

  /** Render matches as a `[Source: ...]` context block. */
  public formatContext(matches: readonly QueryMatch[]): string {
    return QueryEngine.formatContext(matches);
  }

  /** @returns false (and changes nothing) for unknown ids. */
  public deleteDocument(documentId: string): Promise<boolean> {
    return this.guarded(async () => {
      const removed = await this.registry.deleteDocument(documentId);
      if (removed) {
        console.error(`[memory] Deleted document ${documentId}`);
        this.refreshTotals();
        await this.autoPersist();
      }
      return removed;
    });
  }

  /** @throws {NotFoundError} */
  public getDocument(documentId: string): Document {
    this.ensureOpen();
    return this.registry.getDocument(documentId);
  }

  public listDocuments(): Document[] {
    this.ensureOpen();
    return this.registry.listDocuments();
  }

  public statistics(): MemoryStatistics {
    this.ensureOpen();
    return this.registry.statistics();
  }

  /** Remove every document and vector. */
  public clear(): Promise<void> {
    return this.guarded(async () => {
      await this.registry.clear();
      this.refreshTotals();
      console.error(`[memory] Memory store cleared`);
      await this.autoPersist();
    });
  }

  /**
   * Write the snapshot now. No-op without a store path.
   * @throws {StorageError}
   */
  public save(): Promise<void> {
    return this.guarded(() => this.persist());
  }

  /**
   * Refuse new calls, wait for every operation already started (an indexing
   * call that is still embedding included), seal the registry and flush the
   * snapshot once. Calling it again returns the same promise.
   *
   * @throws {StorageError} The final flush failed; the engine is closed anyway.
   */
  public close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    try {
      await Promise.allSettled([...this.inFlight]);
      this.registry.close();
      await this.registry.idle();
      await this.saves.idle();
      await this.persist();
    } finally {
      this.closed = true;
      this.status.markReady(false);
    }
  }

  /** Run a public operation, registering it so {@link close} can wait for it. */
  private async guarded<T>(run: () => Promise<T>): Promise<T> {
    this.ensureOpen();
    const pending = run();
    this.inFlight.add(pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(pending);
    }
  }

  private async indexOne(source: string, type: DocumentTypeInput, signal?: AbortSignal): Promise<IndexResult> {
    const documentType = detectDocumentType(source, type);
    const document = await this.track(async () => {
      const text = await extractText(this.extractors, source, documentType, signal);
      return this.registry.indexText(source, text, { type: documentType, signal });
    });
    console.error(`[memory] Document indexed: ${document.id}, ${document.chunkCount} chunks (${source})`);
    return { documentId: document.id, chunksCreated: document.chunkCount, documentType };
  }

  /** Wrap an indexing run with status bookkeeping. */
  private async track(run: () => Promise<Document>): Promise<Document> {
    this.status.indexingStarted();
    try {
      const document = await run();
      this.status.indexingFinished(true);
      this.refreshTotals();
      return document;
    } catch (e) {
      this.status.indexingFinished(false);
      throw e;
    }
  }

  private async restore(): Promise<void> {
    if (!this.persistence) return;
    const snapshot = await this.persistence.load();
    if (!snapshot) return;
    const expected = this.embeddings.dimension;
    if (snapshot.dimension !== expected) {
      throw new InvalidArgumentError(
        `Snapshot dimension ${snapshot.dimension} does not match embedding provider dimension ${expected}`,
      );
    }
    if (snapshot.modelName && snapshot.modelName !== this.embeddings.modelName) {
      console.error(
        `[memory] Snapshot was built with model ${snapshot.modelName}, now using ${this.embeddings.modelName}`,
      );
    }
    try {
      await this.registry.restore(snapshot.records, snapshot.entries, snapshot.dimension);
    } catch (e) {
      throw new StorageError(`Snapshot is inconsistent: ${describeError(e)}`, { cause: e });
    }
  }

  /**
   * Snapshot saves are serialized; each one captures the state current when
   * it starts, so the last save always writes the newest state.
   */
  private persist(): Promise<void> {
    if (this.closed) return Promise.reject(new Error("Memory engine is closed"));
    const persistence = this.persistence;
    if (!persistence) return Promise.resolve();
    return this.saves.run(() =>
      persistence.save({
        dimension: this.index.dimension ?? this.embeddings.dimension,
        modelName: this.embeddings.modelName,
        chunkSize: this.registry.getChunkSize(),
        records: this.registry.listRecords(),
        entries: this.index.allEntries(),
      }),
    );
  }

  /**
   * Autosave after a committed mutation. The mutation already succeeded, so
   * a failed write is logged rather than reported as a failed mutation;
   * {@link save} and {@link close} surface it.
   */
  private async autoPersist(): Promise<void> {
    if (!this.autoSave) return;
    try {
      await this.persist();
    } catch (e) {
      console.error(`[memory] Failed to save snapshot:`, e);
    }
  }

  private refreshTotals(): void {
    this.status.setTotals(this.registry.listDocuments().length, this.index.size, this.index.dimension);
  }

  private ensureOpen(): void {
    if (this.closed || this.closing) throw new Error("Memory engine is closed");
  }
}
