import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { ExtractionError } from "../errors";
import { TextFileExtractor, detectDocumentType, extractText, type ExtractorMap } from "../extractors";
import { makeTempDir, removeDir } from "./helpers";

describe("detectDocumentType", () => {
  it.each([
    ["notes.txt", "text"],
    ["README.md", "text"],
    ["paper.PDF", "pdf"],
    ["photo.jpeg", "image"],
    ["scan.png", "image"],
    ["memo.m4a", "audio"],
    ["call.wav", "audio"],
    ["data.csv", "text"],
    ["no-extension", "text"],
  ])("%s -> %s", (source, expected) => {
    expect(detectDocumentType(source)).toBe(expected);
  });

  it("keeps an explicit type", () => {
    expect(detectDocumentType("photo.png", "pdf")).toBe("pdf");
  });
});

describe("TextFileExtractor", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await removeDir(dir);
    dir = undefined;
  });

  it("reads UTF-8 text", async () => {
    dir = await makeTempDir();
    const file = path.join(dir, "note.txt");
    await fs.writeFile(file, "café au lait");
    expect(await new TextFileExtractor().extract(file)).toBe("café au lait");
  });

  it("wraps read failures", async () => {
    const attempt = new TextFileExtractor().extract("/definitely/not/here.txt");
    await expect(attempt).rejects.toThrow(ExtractionError);
    await expect(attempt).rejects.toMatchObject({ source: "/definitely/not/here.txt" });
  });
});

describe("extractText", () => {
  it("fails when no extractor handles the type", async () => {
    await expect(extractText({}, "clip.mp3", "audio")).rejects.toThrow(
      "No extractor configured for audio documents",
    );
  });

  it("wraps foreign errors and keeps extraction errors", async () => {
    const original = new ExtractionError("a.txt", "unreadable");
    const extractors: ExtractorMap = {
      text: {
        extract: async () => {
          throw original;
        },
      },
      image: {
        extract: async () => {
          throw new Error("ocr offline");
        },
      },
    };
    await expect(extractText(extractors, "a.txt", "text")).rejects.toBe(original);
    await expect(extractText(extractors, "b.png", "image")).rejects.toThrow(
      "Extraction failed for b.png: ocr offline",
    );
  });

  it("rethrows the abort reason", async () => {
    const controller = new AbortController();
    const extractors: ExtractorMap = {
      text: {
        extract: async () => {
          controller.abort(new Error("user cancelled"));
          throw new Error("interrupted");
        },
      },
    };
    await expect(extractText(extractors, "a.txt", "text", controller.signal)).rejects.toThrow("user cancelled");
  });
});
