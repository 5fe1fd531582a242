import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbeddingProvider } from "../embeddings";

/**
 * Deterministic bag-of-words provider: every vocabulary word owns one axis,
 * anything else lands on a shared trailing "other" axis. Vectors are returned
 * un-normalized on purpose so the engine's normalization is exercised.
 */
export class KeywordEmbeddings implements EmbeddingProvider {
  public readonly modelName: string;
  public readonly dimension: number;
  public readonly calls: string[] = [];
  private readonly vocabulary: readonly string[];

  public constructor(vocabulary: readonly string[], modelName = "keyword-test") {
    this.vocabulary = vocabulary;
    this.dimension = vocabulary.length + 1;
    this.modelName = modelName;
  }

  public async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const v = new Array<number>(this.dimension).fill(0);
    for (const token of text.toLowerCase().split(/\s+/).filter(Boolean)) {
      const axis = this.vocabulary.indexOf(token);
      v[axis >= 0 ? axis : this.dimension - 1] += 1;
    }
    return v;
  }
}

export const VOCABULARY = ["apple", "banana", "rocket", "engine"];

/** Sequential ids ("doc-001", "doc-002", ...) that sort in allocation order. */
export function sequentialIds(prefix = "doc"): () => string {
  let n = 0;
  return () => `${prefix}-${String(++n).padStart(3, "0")}`;
}

/** A promise whose resolution the test controls. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function unit(values: number[]): Float32Array {
  const norm = Math.sqrt(values.reduce((s, x) => s + x * x, 0));
  return Float32Array.from(values, (x) => x / norm);
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "memory-rag-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
