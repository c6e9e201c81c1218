/**
 * In-process stand-ins for the embeddings API and the vector store
 */

import type { EmbeddedChunk, RetrievedChunk } from "../../types/index.js";
import type { EmbeddingProvider } from "../EmbeddingService.js";
import { assertDimensions, type UpsertOptions, type VectorStore } from "../VectorStore.js";

/**
 * Deterministic bag-of-characters embedding
 */
export function fakeEmbedding(text: string, dimensions: number): Float32Array {
  const vector = new Float32Array(dimensions);
  for (let i = 0; i < text.length; i++) {
    const slot = text.charCodeAt(i) % dimensions;
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  if (text.length === 0) {
    vector[0] = 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = "fake";
  readonly requests: string[][] = [];
  /** Errors thrown by upcoming calls, in order */
  readonly failures: unknown[] = [];

  constructor(public readonly dimensions = 8) {}

  async embed(texts: string[]): Promise<Float32Array[]> {
    this.requests.push([...texts]);
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
    return texts.map((text) => fakeEmbedding(text, this.dimensions));
  }
}

function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return na === 0 || nb === 0 ? 0 : dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export class InMemoryVectorStore implements VectorStore {
  readonly backend = "memory";
  readonly chunks = new Map<string, EmbeddedChunk>();
  /** Throw from upsert once this many upserts have succeeded */
  failUpsertsAfter: number | null = null;
  upsertCalls = 0;
  closed = false;

  constructor(public readonly dimensions = 8) {}

  async upsert(chunks: readonly EmbeddedChunk[], options: UpsertOptions): Promise<void> {
    if (this.failUpsertsAfter !== null && this.upsertCalls >= this.failUpsertsAfter) {
      throw new Error("store unavailable");
    }
    this.upsertCalls++;
    for (const chunk of chunks) {
      assertDimensions(this.dimensions, chunk.embedding);
    }
    if (options.replaceExisting) {
      await this.deleteByPath([...new Set(chunks.map((c) => c.sourcePath))]);
    }
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  async deleteByPath(sourcePaths: readonly string[]): Promise<void> {
    const doomed = new Set(sourcePaths);
    for (const [id, chunk] of this.chunks) {
      if (doomed.has(chunk.sourcePath)) {
        this.chunks.delete(id);
      }
    }
  }

  async query(embedding: Float32Array, k: number): Promise<RetrievedChunk[]> {
    return [...this.chunks.values()]
      .map((chunk) => ({ chunk, similarity: cosine(embedding, chunk.embedding) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k)
      .map(({ chunk, similarity }) => ({
        id: chunk.id,
        sourcePath: chunk.sourcePath,
        text: chunk.text,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        sequenceIndex: chunk.sequenceIndex,
        startLine: chunk.startLine,
        endLine: chunk.endLine,
        similarity,
      }));
  }

  async reset(): Promise<void> {
    this.chunks.clear();
  }

  async countChunks(): Promise<number> {
    return this.chunks.size;
  }

  async listChunkIds(sourcePath: string): Promise<string[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.sourcePath === sourcePath)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex)
      .map((chunk) => chunk.id);
  }

  /** Chunk texts stored for one file, in order */
  textsFor(sourcePath: string): string[] {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.sourcePath === sourcePath)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex)
      .map((chunk) => chunk.text);
  }

  paths(): string[] {
    return [...new Set([...this.chunks.values()].map((c) => c.sourcePath))].sort();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
