import { describe, it, expect } from "vitest";
import { chunk, DEFAULT_CHUNK_SIZE } from "../chunker";
import { InvalidArgumentError } from "../errors";

describe("chunk", () => {
  it("emits half-overlapping windows and the trailing partial window", () => {
    expect(chunk("a b c d e f", 4)).toEqual(["a b c d", "c d e f", "e f"]);
  });

  it("uses floor(size / 2) as stride for odd sizes", () => {
    expect(chunk("a b c d e f g", 5)).toEqual(["a b c d e", "c d e f g", "e f g", "g"]);
  });

  it("collapses any whitespace run into a single space", () => {
    expect(chunk("  a\n\n b\tc  ", 4)).toEqual(["a b c", "c"]);
  });

  it("returns a single window when the text fits", () => {
    expect(chunk("apple banana", 4)).toEqual(["apple banana"]);
  });

  it("returns nothing for empty or whitespace-only text", () => {
    expect(chunk("", 4)).toEqual([]);
    expect(chunk(" \n\t ", 4)).toEqual([]);
  });

  it("is deterministic", () => {
    const text = "one two three four five six seven eight nine ten eleven";
    expect(chunk(text, 6)).toEqual(chunk(text, 6));
  });

  it("accepts the smallest valid size", () => {
    expect(chunk("a b c", 2)).toEqual(["a b", "b c", "c"]);
  });

  it.each([1, 0, -4, 2.5, Number.NaN])("rejects chunk size %s", (size) => {
    expect(() => chunk("a b c", size)).toThrow(InvalidArgumentError);
  });

  it("defaults to 512-token windows", () => {
    expect(DEFAULT_CHUNK_SIZE).toBe(512);
    const words = Array.from({ length: 600 }, (_, i) => `w${i}`).join(" ");
    const out = chunk(words);
    expect(out).toHaveLength(3);
    expect(out[0].split(" ")).toHaveLength(512);
    expect(out[1].split(" ")[0]).toBe("w256");
    expect(out[2].split(" ")).toHaveLength(88);
  });
});
