/**
 * Vector store contract shared by the local sqlite-vec index and Qdrant.
 *
 * @module search/VectorStore
 */

import * as crypto from "crypto";
import type { Chunk, EmbeddedChunk, RetrievedChunk } from "../types/index.js";
import { RepoChatError } from "../types/index.js";

// ============================================================================
// Error Classes
// ============================================================================

export class VectorStoreError extends RepoChatError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, code, undefined, cause);
    this.name = "VectorStoreError";
  }
}

export class VectorDimensionMismatchError extends VectorStoreError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, "DIMENSION_MISMATCH");
    this.name = "VectorDimensionMismatchError";
  }
}

// ============================================================================
// Contract
// ============================================================================

export interface UpsertOptions {
  /** Remove every stored chunk of the affected source paths before inserting */
  replaceExisting: boolean;
}

export interface VectorStore {
  /** Human-readable backend description */
  readonly backend: string;
  readonly dimensions: number;

  upsert(chunks: readonly EmbeddedChunk[], options: UpsertOptions): Promise<void>;
  deleteByPath(sourcePaths: readonly string[]): Promise<void>;
  /** Nearest chunks first */
  query(embedding: Float32Array, k: number): Promise<RetrievedChunk[]>;
  reset(): Promise<void>;
  countChunks(): Promise<number>;
  listChunkIds(sourcePath: string): Promise<string[]>;
  close(): Promise<void>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Deterministic chunk id: SHA-256 of "<path>#<index>" laid out as a UUID
 */
export function chunkId(sourcePath: string, sequenceIndex: number): string {
  const hex = crypto.createHash("sha256").update(`${sourcePath}#${sequenceIndex}`).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export function toEmbeddedChunk(chunk: Chunk, embedding: Float32Array): EmbeddedChunk {
  return { ...chunk, id: chunkId(chunk.sourcePath, chunk.sequenceIndex), embedding };
}

export function assertDimensions(expected: number, embedding: Float32Array): void {
  if (embedding.length !== expected) {
    throw new VectorDimensionMismatchError(expected, embedding.length);
  }
}
