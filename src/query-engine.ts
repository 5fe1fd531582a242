import { EmbeddingError, InvalidArgumentError, describeError } from "./errors";
import type { EmbeddingProvider } from "./embeddings";
import type { DocumentRegistry } from "./registry";
import type { QueryFilter, QueryMatch, QueryResponse, SearchHit } from "./types";
import { compareHits, type VectorIndex } from "./vector-index";
import { normalizeEmbedding } from "./vector-math";

export const DEFAULT_TOP_K = 5;

/** Score added per distinct query term found in a chunk when re-ranking. */
export const TERM_OVERLAP_BONUS = 0.05;

/** Hits taken per query variation in fusion retrieval. */
export const FUSION_VARIATION_TOP_K = 3;

export interface QueryOptions {
  topK?: number;
  filter?: QueryFilter;
  /** Boost candidates by query-term overlap after the vector search. */
  rerank?: boolean;
  /**
   * Also search phrasings of the query ("What is X?", "Explain X",
   * "Information about X") and merge their hits with the direct ones.
   */
  fusion?: boolean;
  signal?: AbortSignal;
}

export interface QueryEngineOptions {
  registry: DocumentRegistry;
  index: VectorIndex;
  embeddings: EmbeddingProvider;
}

/**
 * Embeds the query, searches the index and turns raw hits into attributed
 * matches. Every embedding happens before anything is read; the searches and
 * the chunk-text lookups then run in one synchronous stretch, so a concurrent
 * delete cannot leave a hit without its text.
 */
export class QueryEngine {
  private readonly registry: DocumentRegistry;
  private readonly index: VectorIndex;
  private readonly embeddings: EmbeddingProvider;

  public constructor(opts: QueryEngineOptions) {
    this.registry = opts.registry;
    this.index = opts.index;
    this.embeddings = opts.embeddings;
  }

  public async query(text: string, opts: QueryOptions = {}): Promise<QueryResponse> {
    const { topK = DEFAULT_TOP_K, filter, rerank = false, fusion = false, signal } = opts;
    if (!text.trim()) throw new InvalidArgumentError("Query text must not be empty");
    if (!Number.isInteger(topK) || topK < 0) {
      throw new InvalidArgumentError(`top_k must be a non-negative integer (got ${topK})`);
    }
    signal?.throwIfAborted();
    if (this.index.size === 0) return { query: text, status: "empty", totalEntries: 0, matches: [] };

    const [queryVector, ...variationVectors] = await this.embedAll(
      fusion ? [text, ...QueryEngine.variations(text)] : [text],
      signal,
    );
    signal?.throwIfAborted();

    // The corpus may have been emptied while the query was being embedded.
    const totalEntries = this.index.size;
    if (totalEntries === 0) return { query: text, status: "empty", totalEntries: 0, matches: [] };

    const candidates = rerank ? topK * 2 : topK;
    const predicate = this.buildPredicate(filter);
    let hits = this.index.search(queryVector, candidates, predicate);
    if (variationVectors.length) {
      const perVariation = Math.min(FUSION_VARIATION_TOP_K, candidates);
      hits = QueryEngine.fuse([hits, ...variationVectors.map((v) => this.index.search(v, perVariation, predicate))]);
    }

    let matches: QueryMatch[] = [];
    for (const hit of hits) {
      const document = this.registry.findDocument(hit.documentId);
      const chunkText = this.registry.chunkText(hit.documentId, hit.chunkIndex);
      if (!document || chunkText === undefined) continue;
      matches.push({
        documentId: hit.documentId,
        source: document.source,
        type: document.type,
        chunkIndex: hit.chunkIndex,
        chunkText,
        score: hit.score,
        similarity: hit.score,
      });
    }
    if (rerank) matches = QueryEngine.rerank(text, matches);
    return { query: text, status: "ok", totalEntries, matches: matches.slice(0, topK) };
  }

  /** Phrasings searched alongside the query in fusion retrieval. */
  public static variations(query: string): string[] {
    return [`What is ${query}?`, `Explain ${query}`, `Information about ${query}`];
  }

  /**
   * Merge hit lists, keeping one hit per (documentId, chunkIndex) with its
   * best score, ordered like a single search.
   */
  public static fuse(lists: readonly (readonly SearchHit[])[]): SearchHit[] {
    const best = new Map<string, SearchHit>();
    for (const list of lists) {
      for (const hit of list) {
        const key = `${hit.documentId}\u0000${hit.chunkIndex}`;
        const seen = best.get(key);
        if (!seen || hit.score > seen.score) best.set(key, hit);
      }
    }
    return [...best.values()].sort(compareHits);
  }

  /**
   * Lexical re-ranking: add {@link TERM_OVERLAP_BONUS} for every distinct
   * lowercase query term that also appears as a term of the chunk, then
   * re-sort with the index's ordering.
   */
  public static rerank(query: string, matches: readonly QueryMatch[]): QueryMatch[] {
    const queryTerms = new Set(query.toLowerCase().split(/\s+/).filter(Boolean));
    return matches
      .map((m) => {
        const chunkTerms = new Set(m.chunkText.toLowerCase().split(/\s+/).filter(Boolean));
        let overlap = 0;
        for (const t of queryTerms) if (chunkTerms.has(t)) overlap++;
        return { ...m, score: m.similarity + overlap * TERM_OVERLAP_BONUS };
      })
      .sort(compareHits);
  }

  /** Render matches as a prompt context block, one `[Source: ...]` section per match. */
  public static formatContext(matches: readonly QueryMatch[]): string {
    return matches.map((m) => `[Source: ${m.source}]\n${m.chunkText}`).join("\n\n");
  }

  private async embedAll(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (const t of texts) {
      signal?.throwIfAborted();
      let raw: ArrayLike<number>;
      try {
        raw = await this.embeddings.embed(t, signal);
      } catch (e) {
        signal?.throwIfAborted();
        throw new EmbeddingError(`Embedding provider failed: ${describeError(e)}`, { cause: e });
      }
      vectors.push(normalizeEmbedding(raw));
    }
    return vectors;
  }

  private buildPredicate(filter?: QueryFilter): ((documentId: string) => boolean) | undefined {
    if (!filter) return undefined;
    const { type, source, documentIds } = filter;
    if (type === undefined && source === undefined && documentIds === undefined) return undefined;
    const allowed = documentIds ? new Set(documentIds) : undefined;
    return (documentId) => {
      if (allowed && !allowed.has(documentId)) return false;
      const document = this.registry.findDocument(documentId);
      if (!document) return false;
      if (type !== undefined && document.type !== type) return false;
      if (source !== undefined && document.source !== source) return false;
      return true;
    };
  }
}
