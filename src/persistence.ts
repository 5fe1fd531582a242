import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StorageError, describeError } from "./errors";
import type { DocumentRecord } from "./registry";
import { DOCUMENT_TYPES } from "./types";
import type { VectorEntry } from "./types";

export const SNAPSHOT_VERSION = 1;

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  meta: z.object({
    dimension: z.number().int().positive(),
    modelName: z.string().optional(),
    chunkSize: z.number().int().optional(),
    savedAt: z.string().optional(),
    embEncoding: z.literal("f32-base64"),
  }),
  documents: z.array(
    z.object({
      id: z.string().min(1),
      source: z.string(),
      type: z.enum(DOCUMENT_TYPES),
      chunkCount: z.number().int().nonnegative(),
      createdAt: z.string(),
      chunks: z.array(z.string()),
    }),
  ),
  entries: z.array(
    z.object({
      documentId: z.string().min(1),
      chunkIndex: z.number().int().nonnegative(),
      emb: z.string(),
    }),
  ),
});

type SnapshotFile = z.infer<typeof SnapshotSchema>;

/** Decoded snapshot contents. */
export interface Snapshot {
  dimension: number;
  modelName?: string;
  chunkSize?: number;
  savedAt?: string;
  records: DocumentRecord[];
  entries: VectorEntry[];
}

/** Parameters used when persisting the in-memory state to disk. */
export interface SaveParams {
  dimension: number;
  modelName: string;
  chunkSize: number;
  records: readonly DocumentRecord[];
  entries: readonly VectorEntry[];
}

/**
 * Reads and writes the JSON snapshot holding every document record and every
 * vector entry. Embeddings are stored as base64-encoded little-endian 32-bit
 * floats under `emb`.
 */
export class Persistence {
  private readonly storePath: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File path of the JSON snapshot.
   * @param verbose   Whether to emit verbose logging.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Load the snapshot.
   * @returns null when no snapshot exists yet.
   * @throws {StorageError} If the file cannot be read, parsed or decoded.
   */
  public async load(): Promise<Snapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) return null;
      throw new StorageError(`Failed to read snapshot at ${this.storePath}: ${describeError(e)}`, { cause: e });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new StorageError(`Snapshot at ${this.storePath} is not valid JSON`, { cause: e });
    }
    const parsed = SnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Snapshot at ${this.storePath} is malformed: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    const snapshot = decodeSnapshot(parsed.data);
    console.error(
      `[memory] Loaded snapshot: ${snapshot.records.length} documents, ${snapshot.entries.length} chunks.`,
    );
    if (this.verbose) console.error(`[memory][verbose] Loaded from ${this.storePath}`);
    return snapshot;
  }

  /**
   * Persist the given state. Writes a temporary file and renames it over the
   * snapshot so a crash mid-write leaves the previous snapshot intact.
   * @throws {StorageError}
   */
  public async save(params: SaveParams): Promise<void> {
    const { dimension, modelName, chunkSize, records, entries } = params;
    const out: SnapshotFile = {
      version: SNAPSHOT_VERSION,
      meta: {
        dimension,
        modelName,
        chunkSize,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      documents: records.map(({ document, chunks }) => ({ ...document, chunks: [...chunks] })),
      entries: entries.map((e) => ({
        documentId: e.documentId,
        chunkIndex: e.chunkIndex,
        emb: encodeEmbedding(e.embedding),
      })),
    };
    const tmp = `${this.storePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(out));
      await fs.rename(tmp, this.storePath);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw new StorageError(`Failed to save snapshot to ${this.storePath}: ${describeError(e)}`, { cause: e });
    }
    if (this.verbose) console.error(`[memory][verbose] Persisted snapshot to ${this.storePath}`);
  }
}

export function encodeEmbedding(v: Float32Array): string {
  const buf = Buffer.alloc(v.length * 4);
  for (let i = 0; i < v.length; i++) buf.writeFloatLE(v[i], i * 4);
  return buf.toString("base64");
}

/** @throws {StorageError} If the payload is not a whole number of floats of the expected length. */
export function decodeEmbedding(b64: string, dimension: number): Float32Array {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength !== dimension * 4) {
    throw new StorageError(`Stored embedding has ${buf.byteLength} bytes, expected ${dimension * 4}`);
  }
  const out = new Float32Array(dimension);
  for (let i = 0; i < dimension; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

function decodeSnapshot(file: SnapshotFile): Snapshot {
  const { dimension } = file.meta;
  return {
    dimension,
    modelName: file.meta.modelName,
    chunkSize: file.meta.chunkSize,
    savedAt: file.meta.savedAt,
    records: file.documents.map(({ chunks, ...document }) => ({ document, chunks })),
    entries: file.entries.map((e) => ({
      documentId: e.documentId,
      chunkIndex: e.chunkIndex,
      embedding: decodeEmbedding(e.emb, dimension),
    })),
  };
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
