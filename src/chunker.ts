import { InvalidArgumentError } from "./errors";

/** Default window size in whitespace-delimited tokens. */
export const DEFAULT_CHUNK_SIZE = 512;

/**
 * Split text into overlapping windows of `chunkSize` whitespace-delimited
 * tokens. Windows start every `floor(chunkSize / 2)` tokens (50% overlap) and
 * are re-joined with single spaces. The trailing partial window is emitted
 * standalone whenever it is non-empty, even when the previous window already
 * covers its tokens; it is never merged backwards, so chunk indices stay
 * stable across re-indexing.
 *
 * @param text Full extracted text.
 * @param chunkSize Tokens per window, integer >= 2.
 * @returns Ordered windows; empty for empty or all-whitespace input.
 * @throws {InvalidArgumentError} When the stride would be zero or negative.
 */
export function chunk(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 2) {
    throw new InvalidArgumentError(`chunk_size must be an integer >= 2 (got ${chunkSize})`);
  }
  const tokens = text.split(/\s+/).filter(Boolean);
  const stride = Math.floor(chunkSize / 2);
  const out: string[] = [];
  for (let i = 0; i < tokens.length; i += stride) {
    out.push(tokens.slice(i, i + chunkSize).join(" "));
  }
  return out;
}
