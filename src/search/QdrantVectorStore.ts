/**
 * Qdrant-backed vector store
 *
 * Points carry the chunk text and position in their payload; deletions by
 * file use a payload filter on `source_path`.
 *
 * @module search/QdrantVectorStore
 */

import { QdrantClient as QdrantSDKClient } from "@qdrant/js-client-rest";
import type { EmbeddedChunk, RetrievedChunk } from "../types/index.js";
import { toError } from "../types/index.js";
import { VectorStoreError, assertDimensions, type UpsertOptions, type VectorStore } from "./VectorStore.js";

// ============================================================================
// Error Classes
// ============================================================================

export class QdrantConnectionError extends VectorStoreError {
  constructor(message: string, cause?: Error) {
    super(message, "CONNECTION_FAILED", cause);
    this.name = "QdrantConnectionError";
  }
}

export class QdrantOperationError extends VectorStoreError {
  constructor(
    message: string,
    public readonly operation: string,
    code: string,
    cause?: Error
  ) {
    super(message, code, cause);
    this.name = "QdrantOperationError";
  }
}

// ============================================================================
// Configuration
// ============================================================================

export interface QdrantStoreConfig {
  /** Qdrant server URL (e.g., 'http://localhost:6333') */
  url: string;
  apiKey?: string;
  collectionName: string;
  vectorDimensions?: number;
  /** Request timeout in milliseconds (default: 5000) */
  timeout?: number;
  /** Points per upsert request (default: 256) */
  upsertBatchSize?: number;
}

const DEFAULT_VECTOR_DIMENSIONS = 768;
const DEFAULT_TIMEOUT = 5000;
const DEFAULT_UPSERT_BATCH = 256;

type ChunkPayload = {
  source_path: string;
  sequence_index: number;
  start_offset: number;
  end_offset: number;
  start_line: number;
  end_line: number;
  content: string;
  chunk_id: string;
};

function pathFilter(sourcePath: string) {
  return { must: [{ key: "source_path", match: { value: sourcePath } }] };
}

function num(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// ============================================================================
// Qdrant Store Implementation
// ============================================================================

export class QdrantVectorStore implements VectorStore {
  private client: QdrantSDKClient | null = null;
  private readonly collectionName: string;
  private readonly vectorDimensions: number;
  private readonly upsertBatchSize: number;

  constructor(private readonly config: QdrantStoreConfig) {
    this.collectionName = config.collectionName;
    this.vectorDimensions = config.vectorDimensions ?? DEFAULT_VECTOR_DIMENSIONS;
    this.upsertBatchSize = config.upsertBatchSize ?? DEFAULT_UPSERT_BATCH;
  }

  get backend(): string {
    return `qdrant (${this.config.url}, collection ${this.collectionName})`;
  }

  get dimensions(): number {
    return this.vectorDimensions;
  }

  /**
   * Connect and make sure the collection exists
   *
   * @throws {QdrantConnectionError} If the server cannot be reached
   */
  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const clientConfig: { url: string; apiKey?: string; timeout?: number } = {
      url: this.config.url,
      timeout: this.config.timeout ?? DEFAULT_TIMEOUT,
    };
    if (this.config.apiKey !== undefined) {
      clientConfig.apiKey = this.config.apiKey;
    }
    const client = new QdrantSDKClient(clientConfig);

    let exists: boolean;
    try {
      const collections = await client.getCollections();
      exists = collections.collections.some((c) => c.name === this.collectionName);
    } catch (error) {
      const cause = toError(error);
      throw new QdrantConnectionError(
        `Failed to connect to Qdrant at ${this.config.url}: ${cause.message}`,
        cause
      );
    }

    if (!exists) {
      await this.run("createCollection", "CREATE_COLLECTION_FAILED", () =>
        client.createCollection(this.collectionName, {
          vectors: { size: this.vectorDimensions, distance: "Cosine" },
        })
      );
      await this.run("createPayloadIndex", "CREATE_INDEX_FAILED", () =>
        client.createPayloadIndex(this.collectionName, {
          field_name: "source_path",
          field_schema: "keyword",
          wait: true,
        })
      );
    }

    this.client = client;
  }

  async upsert(chunks: readonly EmbeddedChunk[], options: UpsertOptions): Promise<void> {
    const client = this.requireClient();
    for (const chunk of chunks) {
      assertDimensions(this.vectorDimensions, chunk.embedding);
    }

    if (options.replaceExisting) {
      await this.deleteByPath([...new Set(chunks.map((c) => c.sourcePath))]);
    }

    for (let i = 0; i < chunks.length; i += this.upsertBatchSize) {
      const points = chunks.slice(i, i + this.upsertBatchSize).map((chunk) => {
        const payload: ChunkPayload = {
          source_path: chunk.sourcePath,
          sequence_index: chunk.sequenceIndex,
          start_offset: chunk.startOffset,
          end_offset: chunk.endOffset,
          start_line: chunk.startLine,
          end_line: chunk.endLine,
          content: chunk.text,
          chunk_id: chunk.id,
        };
        return { id: chunk.id, vector: Array.from(chunk.embedding), payload };
      });
      await this.run("upsert", "UPSERT_FAILED", () =>
        client.upsert(this.collectionName, { wait: true, points })
      );
    }
  }

  async deleteByPath(sourcePaths: readonly string[]): Promise<void> {
    const client = this.requireClient();
    for (const sourcePath of sourcePaths) {
      await this.run("delete", "DELETE_FAILED", () =>
        client.delete(this.collectionName, { wait: true, filter: pathFilter(sourcePath) })
      );
    }
  }

  async query(embedding: Float32Array, k: number): Promise<RetrievedChunk[]> {
    const client = this.requireClient();
    assertDimensions(this.vectorDimensions, embedding);
    if (k <= 0) {
      return [];
    }

    const results = await this.run("search", "SEARCH_FAILED", () =>
      client.search(this.collectionName, {
        vector: Array.from(embedding),
        limit: k,
        with_payload: true,
      })
    );

    return results.map((result) => {
      const payload: Record<string, unknown> = result.payload ?? {};
      return {
        id: String(result.id),
        sourcePath: str(payload["source_path"]),
        sequenceIndex: num(payload["sequence_index"]),
        startOffset: num(payload["start_offset"]),
        endOffset: num(payload["end_offset"]),
        startLine: num(payload["start_line"]),
        endLine: num(payload["end_line"]),
        text: str(payload["content"]),
        similarity: result.score,
      };
    });
  }

  async reset(): Promise<void> {
    const client = this.requireClient();
    await this.run("delete", "RESET_FAILED", () =>
      client.delete(this.collectionName, { wait: true, filter: { must: [] } })
    );
  }

  async countChunks(): Promise<number> {
    const client = this.requireClient();
    const result = await this.run("count", "COUNT_FAILED", () =>
      client.count(this.collectionName, { exact: true })
    );
    return result.count;
  }

  async listChunkIds(sourcePath: string): Promise<string[]> {
    const client = this.requireClient();
    const ids: Array<{ id: string; seq: number }> = [];
    let offset: string | number | undefined;

    for (;;) {
      const page = await this.run("scroll", "SCROLL_FAILED", () =>
        client.scroll(this.collectionName, {
          filter: pathFilter(sourcePath),
          with_payload: ["sequence_index"],
          with_vector: false,
          limit: 256,
          ...(offset !== undefined && { offset }),
        })
      );
      for (const point of page.points) {
        ids.push({ id: String(point.id), seq: num(point.payload?.["sequence_index"]) });
      }
      const next = page.next_page_offset;
      if (typeof next === "string" || typeof next === "number") {
        offset = next;
      } else {
        break;
      }
    }

    return ids.sort((a, b) => a.seq - b.seq).map((entry) => entry.id);
  }

  async close(): Promise<void> {
    this.client = null;
  }

  private requireClient(): QdrantSDKClient {
    if (!this.client) {
      throw new QdrantConnectionError("Not connected to Qdrant. Call connect() first.");
    }
    return this.client;
  }

  private async run<T>(operation: string, code: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const cause = toError(error);
      throw new QdrantOperationError(
        `Qdrant ${operation} on ${this.collectionName} failed: ${cause.message}`,
        operation,
        code,
        cause
      );
    }
  }
}

export function createQdrantVectorStore(config: QdrantStoreConfig): QdrantVectorStore {
  return new QdrantVectorStore(config);
}
