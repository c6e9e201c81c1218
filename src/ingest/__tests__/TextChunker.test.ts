import { describe, it, expect } from "vitest";
import { TextChunker } from "../TextChunker.js";
import { ConfigurationError } from "../../types/index.js";

describe("TextChunker", () => {
  const chunker = new TextChunker();

  it("should produce overlapping 500-character windows", () => {
    const text = "x".repeat(1200);
    const chunks = chunker.chunk("big.txt", text);

    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 500],
      [450, 950],
      [900, 1200],
    ]);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.sourcePath === "big.txt")).toBe(true);
  });

  it("should keep a short file in one chunk", () => {
    const chunks = chunker.chunk("short.ts", "export const x = 1;\n");
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.text).toBe("export const x = 1;\n");
  });

  it("should emit a single chunk for exactly one window of text", () => {
    expect(chunker.chunk("a.txt", "y".repeat(500))).toHaveLength(1);
  });

  it("should emit a short tail window one character past the boundary", () => {
    const chunks = chunker.chunk("a.txt", "y".repeat(501));
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 500],
      [450, 501],
    ]);
  });

  it("should return no chunks for empty or whitespace-only text", () => {
    expect(chunker.chunk("empty.txt", "")).toEqual([]);
    expect(chunker.chunk("blank.txt", " \n\t\n")).toEqual([]);
  });

  it("should report 1-based line ranges", () => {
    const small = new TextChunker({ chunkSize: 4, chunkOverlap: 1 });
    const chunks = small.chunk("lines.txt", "ab\ncd\nef");

    expect(chunks.map((c) => [c.text, c.startLine, c.endLine])).toEqual([
      ["ab\nc", 1, 2],
      ["cd\ne", 2, 3],
      ["ef", 3, 3],
    ]);
  });

  it("should not count a trailing newline as another line", () => {
    const [only] = chunker.chunk("a.txt", "abc\n");
    expect(only?.endLine).toBe(1);
  });

  it("should never split a surrogate pair across windows", () => {
    const text = "a".repeat(499) + "\u{1F600}" + "b".repeat(600);
    const chunks = chunker.chunk("emoji.md", text);

    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 501],
      [450, 951],
      [901, 1101],
    ]);
    expect(chunks[0]?.text.endsWith("\u{1F600}")).toBe(true);
    expect(Array.from(chunks[0]?.text ?? "")).toHaveLength(500);
    expect(chunks[1]?.text.charCodeAt(0)).toBe(97);
    expect(chunks.map((c) => text.slice(c.startOffset, c.endOffset))).toEqual(chunks.map((c) => c.text));
  });

  it("should produce the same chunks for the same content", () => {
    const text = "function f() {\n  return 1;\n}\n".repeat(40);

    const first = chunker.chunk("same.ts", text);
    const second = new TextChunker().chunk("same.ts", text);

    expect(first.length).toBeGreaterThan(1);
    expect(second).toEqual(first);
  });

  it("should reject invalid window parameters", () => {
    expect(() => new TextChunker({ chunkSize: 0 })).toThrow(ConfigurationError);
    expect(() => new TextChunker({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      "Chunk overlap must be an integer in [0, 100), got 100"
    );
    expect(() => new TextChunker({ chunkOverlap: -1 })).toThrow(ConfigurationError);
  });
});
