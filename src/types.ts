/** Source kinds understood by the extractors. */
export const DOCUMENT_TYPES = ["text", "pdf", "image", "audio"] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/** A concrete type, or "auto" to resolve it from the source's extension. */
export type DocumentTypeInput = DocumentType | "auto";

/**
 * A committed document. Everything except the id is descriptive metadata;
 * the chunk texts themselves live in the registry next to this record.
 */
export interface Document {
  /** UUID, never reused after deletion. */
  readonly id: string;
  /** Path or URI the text was extracted from. */
  readonly source: string;
  readonly type: DocumentType;
  /** Number of live vector entries owned by this document. */
  readonly chunkCount: number;
  /** ISO-8601 commit time. */
  readonly createdAt: string;
}

/** One retrievable window of a document's text. */
export interface Chunk {
  readonly documentId: string;
  /** 0-based position within the document. */
  readonly chunkIndex: number;
  readonly text: string;
}

/** A stored, unit-normalized embedding for one chunk. */
export interface VectorEntry {
  readonly documentId: string;
  readonly chunkIndex: number;
  readonly embedding: Float32Array;
}

/** Raw similarity hit produced by the vector index. */
export interface SearchHit {
  readonly documentId: string;
  readonly chunkIndex: number;
  readonly score: number;
}

/** Summary returned by index operations. */
export interface IndexResult {
  documentId: string;
  chunksCreated: number;
  documentType: DocumentType;
}

export interface QueryFilter {
  type?: DocumentType;
  source?: string;
  documentIds?: readonly string[];
}

/** A ranked, attributed hit. */
export interface QueryMatch {
  documentId: string;
  source: string;
  type: DocumentType;
  chunkIndex: number;
  chunkText: string;
  /** Final ranking score (boosted when re-ranking is on). */
  score: number;
  /** Raw cosine similarity between the query and the chunk. */
  similarity: number;
}

/**
 * `status: "empty"` means the index holds no live entries (documents that
 * produced zero chunks do not count); a corpus with entries but no matching
 * candidates still reports "ok" with an empty `matches` list.
 */
export interface QueryResponse {
  query: string;
  status: "ok" | "empty";
  totalEntries: number;
  matches: QueryMatch[];
}

export interface MemoryStatistics {
  totalDocuments: number;
  totalChunks: number;
  documentTypes: Record<DocumentType, number>;
  /** Undefined until the first vector is stored or a snapshot is loaded. */
  dimension: number | undefined;
}
