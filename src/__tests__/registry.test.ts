import { describe, it, expect, beforeEach } from "vitest";
import { EmbeddingError, InvalidArgumentError, NotFoundError } from "../errors";
import type { EmbeddingProvider } from "../embeddings";
import { DocumentRegistry } from "../registry";
import { VectorIndex } from "../vector-index";
import { l2Norm } from "../vector-math";
import { KeywordEmbeddings, VOCABULARY, deferred, sequentialIds } from "./helpers";

const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

function setup(embeddings: EmbeddingProvider = new KeywordEmbeddings(VOCABULARY), chunkSize = 4) {
  const index = new VectorIndex();
  const registry = new DocumentRegistry({
    index,
    embeddings,
    chunkSize,
    generateId: sequentialIds(),
    now: () => FIXED_NOW,
  });
  return { index, registry };
}

/** Counts live entries per document to compare against chunkCount. */
function assertChunkCounts(index: VectorIndex, registry: DocumentRegistry) {
  for (const doc of registry.listDocuments()) {
    expect(index.entriesFor(doc.id)).toHaveLength(doc.chunkCount);
  }
  const total = registry.listDocuments().reduce((s, d) => s + d.chunkCount, 0);
  expect(index.size).toBe(total);
}

describe("DocumentRegistry", () => {
  let index: VectorIndex;
  let registry: DocumentRegistry;

  beforeEach(() => {
    ({ index, registry } = setup());
  });

  it("commits a document with one vector per chunk", async () => {
    const doc = await registry.indexText("notes.txt", "apple banana rocket engine apple banana");
    expect(doc).toEqual({
      id: "doc-001",
      source: "notes.txt",
      type: "text",
      chunkCount: 3,
      createdAt: "2024-05-01T12:00:00.000Z",
    });
    expect(registry.chunkText(doc.id, 0)).toBe("apple banana rocket engine");
    expect(registry.chunkText(doc.id, 1)).toBe("rocket engine apple banana");
    expect(registry.chunkText(doc.id, 2)).toBe("apple banana");
    assertChunkCounts(index, registry);
  });

  it("stores unit-normalized embeddings", async () => {
    await registry.indexText("a.txt", "apple apple banana rocket engine engine engine");
    for (const entry of index.allEntries()) {
      expect(Math.abs(l2Norm(entry.embedding) - 1)).toBeLessThan(1e-5);
    }
  });

  it("produces the same chunk count when re-indexing identical text", async () => {
    const text = "apple banana rocket engine apple banana rocket";
    const first = await registry.indexText("same.txt", text);
    const second = await registry.indexText("same.txt", text);
    expect(second.id).not.toBe(first.id);
    expect(second.chunkCount).toBe(first.chunkCount);
  });

  it("commits an empty document with zero chunks", async () => {
    const doc = await registry.indexText("empty.txt", "   ");
    expect(doc.chunkCount).toBe(0);
    expect(registry.getDocument(doc.id)).toEqual(doc);
    expect(index.size).toBe(0);
  });

  it("records the document type", async () => {
    const doc = await registry.indexText("scan.pdf", "apple", { type: "pdf" });
    expect(doc.type).toBe("pdf");
    expect(registry.statistics().documentTypes).toEqual({ text: 0, pdf: 1, image: 0, audio: 0 });
  });

  describe("failure leaves no partial state", () => {
    it("when the provider throws part-way", async () => {
      let calls = 0;
      const flaky: EmbeddingProvider = {
        modelName: "flaky",
        dimension: 2,
        embed: async () => {
          calls++;
          if (calls === 2) throw new Error("model crashed");
          return [1, 0];
        },
      };
      ({ index, registry } = setup(flaky));
      const attempt = registry.indexText("x.txt", "a b c d e f");
      await expect(attempt).rejects.toThrow(EmbeddingError);
      await expect(attempt).rejects.toThrow("model crashed");
      expect(registry.listDocuments()).toEqual([]);
      expect(index.size).toBe(0);
    });

    it("when the provider returns a zero vector", async () => {
      const zero: EmbeddingProvider = { modelName: "zero", dimension: 2, embed: async () => [0, 0] };
      ({ index, registry } = setup(zero));
      await expect(registry.indexText("x.txt", "a b")).rejects.toThrow(EmbeddingError);
      expect(registry.listDocuments()).toEqual([]);
      expect(index.size).toBe(0);
    });

    it("when the provider's dimension changes", async () => {
      let dim = 3;
      const shifting: EmbeddingProvider = {
        modelName: "shifting",
        get dimension() {
          return dim;
        },
        embed: async () => new Array<number>(dim).fill(1),
      };
      ({ index, registry } = setup(shifting));
      await registry.indexText("first.txt", "a b");
      dim = 4;
      await expect(registry.indexText("second.txt", "a b")).rejects.toThrow(InvalidArgumentError);
      expect(registry.listDocuments().map((d) => d.source)).toEqual(["first.txt"]);
      assertChunkCounts(index, registry);
    });

    it("when aborted during embedding", async () => {
      const controller = new AbortController();
      const aborting: EmbeddingProvider = {
        modelName: "aborting",
        dimension: 2,
        embed: async () => {
          controller.abort(new Error("cancelled by caller"));
          return [1, 0];
        },
      };
      ({ index, registry } = setup(aborting));
      await expect(
        registry.indexText("x.txt", "a b c d e f", { signal: controller.signal }),
      ).rejects.toThrow("cancelled by caller");
      expect(registry.listDocuments()).toEqual([]);
      expect(index.size).toBe(0);
    });

    it("when aborted before starting", async () => {
      const controller = new AbortController();
      controller.abort(new Error("too late"));
      await expect(registry.indexText("x.txt", "apple", { signal: controller.signal })).rejects.toThrow(
        "too late",
      );
      expect(index.size).toBe(0);
    });
  });

  it("keeps a document invisible until its batch commits", async () => {
    const gate = deferred();
    const keywords = new KeywordEmbeddings(VOCABULARY);
    const gated: EmbeddingProvider = {
      modelName: "gated",
      dimension: keywords.dimension,
      embed: async (text) => {
        await gate.promise;
        return keywords.embed(text);
      },
    };
    ({ index, registry } = setup(gated));
    const pending = registry.indexText("slow.txt", "apple banana rocket engine apple");

    await Promise.resolve();
    expect(index.size).toBe(0);
    expect(registry.listDocuments()).toEqual([]);

    gate.resolve();
    const doc = await pending;
    expect(index.entriesFor(doc.id)).toHaveLength(doc.chunkCount);
    assertChunkCounts(index, registry);
  });

  it("commits concurrent indexing calls independently", async () => {
    const results = await Promise.all([
      registry.indexText("one.txt", "apple banana"),
      registry.indexText("two.txt", "rocket engine rocket engine rocket"),
      registry.indexText("three.txt", "banana"),
    ]);
    expect(new Set(results.map((d) => d.id)).size).toBe(3);
    expect(registry.listDocuments()).toHaveLength(3);
    assertChunkCounts(index, registry);
  });

  describe("close", () => {
    it("refuses new mutations and keeps reads working", async () => {
      const doc = await registry.indexText("a.txt", "apple");
      registry.close();
      await expect(registry.indexText("b.txt", "banana")).rejects.toThrow("Document registry is closed");
      await expect(registry.deleteDocument(doc.id)).rejects.toThrow("Document registry is closed");
      await expect(registry.clear()).rejects.toThrow("Document registry is closed");
      expect(registry.listDocuments()).toEqual([doc]);
      assertChunkCounts(index, registry);
    });

    it("drops a commit that arrives after closing", async () => {
      const gate = deferred();
      const keywords = new KeywordEmbeddings(VOCABULARY);
      const gated: EmbeddingProvider = {
        modelName: "gated",
        dimension: keywords.dimension,
        embed: async (text) => {
          await gate.promise;
          return keywords.embed(text);
        },
      };
      ({ index, registry } = setup(gated));
      const pending = registry.indexText("slow.txt", "apple banana");
      registry.close();
      gate.resolve();
      await expect(pending).rejects.toThrow("Document registry is closed");
      expect(registry.listDocuments()).toEqual([]);
      expect(index.size).toBe(0);
    });
  });

  describe("deleteDocument", () => {
    it("removes the record and all of its vectors", async () => {
      const keep = await registry.indexText("keep.txt", "apple banana");
      const drop = await registry.indexText("drop.txt", "rocket engine rocket engine rocket engine");
      expect(await registry.deleteDocument(drop.id)).toBe(true);
      expect(index.entriesFor(drop.id)).toEqual([]);
      expect(() => registry.getDocument(drop.id)).toThrow(NotFoundError);
      expect(registry.listDocuments()).toEqual([keep]);
      assertChunkCounts(index, registry);
    });

    it("returns false for an unknown id and changes nothing", async () => {
      await registry.indexText("keep.txt", "apple banana");
      const before = index.allEntries();
      expect(await registry.deleteDocument("missing")).toBe(false);
      expect(index.allEntries()).toBe(before);
      expect(registry.listDocuments()).toHaveLength(1);
    });
  });

  it("throws NotFoundError for unknown ids", () => {
    expect(() => registry.getDocument("nope")).toThrow(NotFoundError);
    expect(registry.findDocument("nope")).toBeUndefined();
  });

  it("reports statistics", async () => {
    await registry.indexText("a.txt", "apple banana rocket engine apple");
    await registry.indexText("b.mp3", "rocket", { type: "audio" });
    expect(registry.statistics()).toEqual({
      totalDocuments: 2,
      totalChunks: 4,
      documentTypes: { text: 1, pdf: 0, image: 0, audio: 1 },
      dimension: 5,
    });
  });

  it("rejects an invalid chunk size at construction", () => {
    expect(
      () => new DocumentRegistry({ index: new VectorIndex(), embeddings: new KeywordEmbeddings(VOCABULARY), chunkSize: 1 }),
    ).toThrow(InvalidArgumentError);
  });

  describe("restore", () => {
    it("rebuilds registry and index together", async () => {
      const source = setup();
      const doc = await source.registry.indexText("a.txt", "apple banana rocket engine apple");
      await registry.restore(source.registry.listRecords(), source.index.allEntries(), 5);
      expect(registry.getDocument(doc.id)).toEqual(doc);
      expect(index.size).toBe(3);
      assertChunkCounts(index, registry);
    });

    it("rejects records whose chunk count disagrees with the vectors", async () => {
      const source = setup();
      const doc = await source.registry.indexText("a.txt", "apple banana rocket engine apple");
      const broken = [{ document: { ...doc, chunkCount: 5 }, chunks: ["x", "y", "z", "u", "v"] }];
      await expect(registry.restore(broken, source.index.allEntries(), 5)).rejects.toThrow(
        InvalidArgumentError,
      );
      expect(registry.listDocuments()).toEqual([]);
    });

    it("rejects vectors without a document", async () => {
      const source = setup();
      await source.registry.indexText("a.txt", "apple");
      await expect(registry.restore([], source.index.allEntries(), 5)).rejects.toThrow(
        InvalidArgumentError,
      );
    });
  });
});
