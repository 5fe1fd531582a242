import { APP_VERSION } from "./config";

/**
 * Counters for indexing runs. `inFlight` goes up and down; the others only
 * grow.
 */
export interface IndexingStatus {
  inFlight: number;
  completed: number;
  failed: number;
}

/**
 * Snapshot of engine lifecycle and corpus size, served by /health in HTTP mode.
 */
export interface EngineStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  modelName: string;
  dimension: number | undefined;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** True once the snapshot (if any) is loaded and startup ingestion finished. */
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  documents: number;
  chunks: number;
  indexing: IndexingStatus;
}

/**
 * Wrapper around mutable status state. Each engine owns one; nothing here is
 * a process-wide singleton.
 */
export class StatusManager {
  private readonly data: EngineStatus;

  public constructor(initial?: Partial<EngineStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      dimension: initial?.dimension,
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      documents: initial?.documents ?? 0,
      chunks: initial?.chunks ?? 0,
      indexing: initial?.indexing ?? { inFlight: 0, completed: 0, failed: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModel(name: string, dimension: number | undefined) {
    this.data.modelName = name;
    this.data.dimension = dimension;
  }

  /** Refresh corpus totals after a commit, delete or reload. */
  public setTotals(documents: number, chunks: number, dimension: number | undefined) {
    this.data.documents = documents;
    this.data.chunks = chunks;
    if (dimension !== undefined) this.data.dimension = dimension;
  }

  public indexingStarted() {
    this.data.indexing.inFlight++;
  }

  public indexingFinished(ok: boolean) {
    this.data.indexing.inFlight = Math.max(0, this.data.indexing.inFlight - 1);
    if (ok) this.data.indexing.completed++;
    else this.data.indexing.failed++;
  }

  public markReady(ready = true) {
    this.data.ready = ready;
  }

  /** Copy of the current status. */
  public getStatus(): EngineStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }
}
