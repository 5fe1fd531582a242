import { EmbeddingError } from "./errors";

/** Allowed drift of a stored vector's L2 norm from 1. */
export const UNIT_NORM_TOLERANCE = 1e-5;

/** Dot product over the common prefix of two vectors. */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let s = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) s += a[i] * b[i];
  return s;
}

export function l2Norm(v: ArrayLike<number>): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Copy a provider vector into a unit-length Float32Array. Providers are
 * expected to normalize already; this re-does it so cosine similarity can be
 * computed as a plain dot product.
 *
 * @throws {EmbeddingError} If the vector is empty, holds a non-finite
 *   component, or has zero norm.
 */
export function normalizeEmbedding(raw: ArrayLike<number>): Float32Array {
  if (raw.length === 0) throw new EmbeddingError("Embedding provider returned an empty vector");
  let sq = 0;
  for (let i = 0; i < raw.length; i++) {
    const x = raw[i];
    if (!Number.isFinite(x)) {
      throw new EmbeddingError(`Embedding has a non-finite component at position ${i}`);
    }
    sq += x * x;
  }
  const norm = Math.sqrt(sq);
  if (!Number.isFinite(norm) || norm === 0) {
    throw new EmbeddingError("Embedding has zero or non-finite norm and cannot be normalized");
  }
  const out = new Float32Array(raw.length);
  for (let i = 0; i < raw.length; i++) out[i] = raw[i] / norm;
  return out;
}

/** Whether `v` is unit length within {@link UNIT_NORM_TOLERANCE}. */
export function isUnitNorm(v: ArrayLike<number>): boolean {
  return Math.abs(l2Norm(v) - 1) <= UNIT_NORM_TOLERANCE;
}
