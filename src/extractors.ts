import fs from "node:fs/promises";
import path from "node:path";
import { ExtractionError, describeError } from "./errors";
import { PdfExtractor } from "./pdf-extractor";
import type { DocumentType, DocumentTypeInput } from "./types";

/** Turns a source (path or URI) into plain text for chunking. */
export interface Extractor {
  extract(source: string, signal?: AbortSignal): Promise<string>;
}

/** Extractors keyed by the document type they handle. */
export type ExtractorMap = Partial<Record<DocumentType, Extractor>>;

const EXTENSION_TYPES: Readonly<Record<string, DocumentType>> = {
  ".txt": "text",
  ".md": "text",
  ".pdf": "pdf",
  ".jpg": "image",
  ".jpeg": "image",
  ".png": "image",
  ".wav": "audio",
  ".mp3": "audio",
  ".m4a": "audio",
};

/** Resolve "auto" from the file extension; unknown extensions are treated as text. */
export function detectDocumentType(source: string, type: DocumentTypeInput = "auto"): DocumentType {
  if (type !== "auto") return type;
  return EXTENSION_TYPES[path.extname(source).toLowerCase()] ?? "text";
}

/** Reads the source as UTF-8 from the local filesystem. */
export class TextFileExtractor implements Extractor {
  public async extract(source: string, signal?: AbortSignal): Promise<string> {
    try {
      return await fs.readFile(source, { encoding: "utf8", signal });
    } catch (e) {
      signal?.throwIfAborted();
      throw new ExtractionError(source, `Cannot read ${source}: ${describeError(e)}`, { cause: e });
    }
  }
}

/** Adapts {@link PdfExtractor} to the {@link Extractor} contract. */
export class PdfTextExtractor implements Extractor {
  private readonly pdf: PdfExtractor;

  public constructor(cacheDir: string, verbose = false) {
    this.pdf = new PdfExtractor(cacheDir, verbose);
  }

  public extract(source: string, signal?: AbortSignal): Promise<string> {
    return this.pdf.extractText(source, signal);
  }
}

/**
 * Built-in extractors: text and PDF. Image (OCR) and audio (transcription)
 * need an external decoder and must be supplied by the caller.
 */
export function defaultExtractors(cacheDir: string, verbose = false): ExtractorMap {
  return {
    text: new TextFileExtractor(),
    pdf: new PdfTextExtractor(cacheDir, verbose),
  };
}

/**
 * Run the extractor registered for `type`. Errors that are not already
 * {@link ExtractionError}s are wrapped; an abort keeps the signal's reason.
 */
export async function extractText(
  extractors: ExtractorMap,
  source: string,
  type: DocumentType,
  signal?: AbortSignal,
): Promise<string> {
  const extractor = extractors[type];
  if (!extractor) {
    throw new ExtractionError(source, `No extractor configured for ${type} documents`);
  }
  try {
    return await extractor.extract(source, signal);
  } catch (e) {
    signal?.throwIfAborted();
    if (e instanceof ExtractionError) throw e;
    throw new ExtractionError(source, `Extraction failed for ${source}: ${describeError(e)}`, { cause: e });
  }
}
