import type { Chunk } from "../types/index.js";
import { ConfigurationError } from "../types/index.js";

export interface ChunkerOptions {
  /** Characters per chunk (default: 500) */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default: 50) */
  chunkOverlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Fixed-size sliding-window chunker.
 *
 * Windows start every `chunkSize - chunkOverlap` characters and stop once a
 * window reaches the end of the text. Sizes count code points, so a
 * surrogate pair is never split; offsets are UTF-16 indexes into the text.
 */
export class TextChunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: ChunkerOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `Chunk overlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
      );
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
  }

  chunk(sourcePath: string, text: string): Chunk[] {
    if (text.trim().length === 0) {
      return [];
    }

    const lineStarts = indexLineStarts(text);
    const boundaries = codePointBoundaries(text);
    const length = boundaries ? boundaries.length - 1 : text.length;
    const offsetOf = (index: number): number => (boundaries ? boundaries[index] ?? text.length : index);
    const step = this.chunkSize - this.chunkOverlap;
    const chunks: Chunk[] = [];

    for (let first = 0; ; first += step) {
      const last = Math.min(first + this.chunkSize, length);
      const start = offsetOf(first);
      const end = offsetOf(last);
      chunks.push({
        sourcePath,
        text: text.slice(start, end),
        startOffset: start,
        endOffset: end,
        sequenceIndex: chunks.length,
        startLine: lineAt(lineStarts, start),
        endLine: lineAt(lineStarts, end - 1),
      });
      if (last >= length) {
        break;
      }
    }

    return chunks;
  }
}

/**
 * UTF-16 offset of every code point, plus the text length, or null when the
 * text has no surrogate pairs and offsets equal code point indexes
 */
function codePointBoundaries(text: string): number[] | null {
  if (!/[\uD800-\uDFFF]/.test(text)) {
    return null;
  }
  const boundaries: number[] = [];
  let offset = 0;
  for (const char of text) {
    boundaries.push(offset);
    offset += char.length;
  }
  boundaries.push(offset);
  return boundaries;
}

/**
 * Offsets at which each line begins
 */
function indexLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * 1-based line number containing `offset` (binary search)
 */
function lineAt(lineStarts: number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo + 1;
}
