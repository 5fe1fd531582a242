/**
 * PDF text extraction with a JSON text cache.
 *
 * Extracted text is stored in a single `pdf-text-cache.json` beside the index
 * store (or in the working directory when no store is configured), keyed by
 * absolute PDF path:
 *
 *   {
 *     "version": 1,
 *     "entries": {
 *       "/abs/path/file.pdf": {
 *         "pdfSize": 12345,
 *         "extractedAt": "2024-01-01T00:00:00Z",
 *         "text": "extracted text content...",
 *         "pageCount": 10
 *       }
 *     }
 *   }
 *
 * An entry is stale when the PDF's byte size changed since extraction.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ExtractionError, describeError } from "./errors";

const PdfCacheEntrySchema = z.object({
  pdfSize: z.number(),
  extractedAt: z.string(),
  text: z.string(),
  pageCount: z.number(),
});

const PdfCacheStoreSchema = z.object({
  version: z.literal(1),
  entries: z.record(PdfCacheEntrySchema),
});

type PdfCacheStore = z.infer<typeof PdfCacheStoreSchema>;

export const PDF_CACHE_FILE = "pdf-text-cache.json";

export class PdfExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheDir Directory holding the text cache file.
   * @param verbose Enable additional logging
   */
  constructor(cacheDir: string, verbose = false) {
    this.cacheFilePath = path.join(cacheDir, PDF_CACHE_FILE);
    this.verbose = verbose;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    let raw: string;
    try {
      raw = await fs.readFile(this.cacheFilePath, "utf8");
    } catch {
      this.cacheStore = { version: 1, entries: {} };
      return this.cacheStore;
    }
    const parsed = safeJson(raw);
    const result = PdfCacheStoreSchema.safeParse(parsed);
    if (!result.success) {
      console.error(`[pdf] Ignoring unreadable cache at ${this.cacheFilePath}`);
      this.cacheStore = { version: 1, entries: {} };
    } else {
      this.cacheStore = result.data;
    }
    return this.cacheStore;
  }

  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      // The cache is an optimization; extraction already succeeded.
      console.error(`[pdf] Failed to save cache store:`, e);
    }
  }

  /** Cached text for a PDF if the entry matches its current size. */
  public async getFromCache(pdfAbsPath: string, pdfSize: number): Promise<string | null> {
    const store = await this.loadCacheStore();
    const entry = store.entries[pdfAbsPath];
    if (!entry) {
      if (this.verbose) console.error(`[pdf] Cache miss for ${path.basename(pdfAbsPath)}`);
      return null;
    }
    if (entry.pdfSize === pdfSize && entry.text) {
      if (this.verbose) console.error(`[pdf] Cache hit for ${path.basename(pdfAbsPath)}`);
      return entry.text;
    }
    if (this.verbose) console.error(`[pdf] Cache stale for ${path.basename(pdfAbsPath)} (size mismatch)`);
    return null;
  }

  /**
   * Extract text from a PDF file, using the cache when possible.
   * @throws {ExtractionError} When the file cannot be read or parsed.
   */
  public async extractText(source: string, signal?: AbortSignal): Promise<string> {
    const abs = path.resolve(source);
    let data: Buffer;
    try {
      data = await fs.readFile(abs, { signal });
    } catch (e) {
      signal?.throwIfAborted();
      throw new ExtractionError(source, `Cannot read PDF ${source}: ${describeError(e)}`, { cause: e });
    }
    const cached = await this.getFromCache(abs, data.byteLength);
    if (cached !== null) return cached;

    if (this.verbose) console.error(`[pdf] Extracting text from ${path.basename(abs)}...`);
    let parsed: { text: string; pageCount: number };
    try {
      parsed = await parsePdf(data);
    } catch (e) {
      throw new ExtractionError(source, `Failed to extract text from ${source}: ${describeError(e)}`, {
        cause: e,
      });
    }
    const { text, pageCount } = parsed;

    const store = await this.loadCacheStore();
    store.entries[abs] = {
      pdfSize: data.byteLength,
      extractedAt: new Date().toISOString(),
      text,
      pageCount,
    };
    await this.saveCacheStore(store);
    return text;
  }
}

async function parsePdf(data: Buffer): Promise<{ text: string; pageCount: number }> {
  // Loaded on demand: pdf.js is heavy and only PDFs need it.
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return { text: result.text || "", pageCount: result.pages.length };
  } finally {
    await parser.destroy();
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
