/**
 * Local vector store backed by SQLite and the sqlite-vec extension
 *
 * Chunk text and positions live in a regular table; embeddings live in a
 * vec0 virtual table keyed by the same rowid and compared by cosine
 * distance.
 *
 * @module search/VectorIndex
 */

import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import * as path from "path";
import * as fs from "fs";
import { z } from "zod";
import type { EmbeddedChunk, RetrievedChunk } from "../types/index.js";
import { toError } from "../types/index.js";
import {
  VectorDimensionMismatchError,
  VectorStoreError,
  assertDimensions,
  type UpsertOptions,
  type VectorStore,
} from "./VectorStore.js";

// ============================================================================
// Vector Index Configuration
// ============================================================================

/**
 * Minimal database interface for dependency injection
 * Matches the better-sqlite3 API used by VectorIndex
 */
export interface VectorDatabase {
  exec(sql: string): void;
  prepare(sql: string): VectorStatement;
  close(): void;
}

/**
 * Minimal statement interface for dependency injection
 */
export interface VectorStatement {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

export interface VectorIndexConfig {
  /** Path to SQLite database file */
  dbPath?: string;
  /** Vector dimensions (default: 768) */
  vectorDimensions?: number;
  /** Enable WAL mode */
  walMode?: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout?: number;
  /** Optional database instance for testing (bypasses sqlite-vec loading) */
  database?: VectorDatabase;
}

type CoreConfig = Omit<VectorIndexConfig, "database">;

const DEFAULT_CONFIG: Required<CoreConfig> = {
  dbPath: path.join(".repochat", "vectors.db"),
  vectorDimensions: 768,
  walMode: true,
  busyTimeout: 5000,
};

// ============================================================================
// Row Schemas
// ============================================================================

const MatchRowSchema = z.object({
  chunk_id: z.string(),
  source_path: z.string(),
  sequence_index: z.number(),
  start_offset: z.number(),
  end_offset: z.number(),
  start_line: z.number(),
  end_line: z.number(),
  content: z.string(),
  distance: z.number(),
});

const IdRowSchema = z.object({ id: z.union([z.number(), z.bigint()]) });
const ChunkIdRowSchema = z.object({ chunk_id: z.string() });
const CountRowSchema = z.object({ count: z.number() });
const MetaRowSchema = z.object({ value: z.string() });

// ============================================================================
// Vector Index Implementation
// ============================================================================

export class VectorIndex implements VectorStore {
  private readonly db: VectorDatabase;
  private readonly config: Required<CoreConfig>;
  private closed = false;

  constructor(config: VectorIndexConfig = {}) {
    const { database, ...restConfig } = config;
    this.config = { ...DEFAULT_CONFIG, ...restConfig };

    if (database) {
      this.db = database;
    } else {
      if (this.config.dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(this.config.dbPath), { recursive: true });
      }
      this.db = openSqliteVec(this.config.dbPath);
      if (this.config.walMode) {
        this.db.exec("PRAGMA journal_mode = WAL");
      }
      this.db.exec(`PRAGMA busy_timeout = ${this.config.busyTimeout}`);
    }

    this.initializeSchema();
  }

  get backend(): string {
    return `sqlite-vec (${this.config.dbPath})`;
  }

  get dimensions(): number {
    return this.config.vectorDimensions;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chunk_id TEXT NOT NULL UNIQUE,
        source_path TEXT NOT NULL,
        sequence_index INTEGER NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        content TEXT NOT NULL,
        indexed_at TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chunks_source_path
      ON chunks(source_path)
    `);
    this.db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS chunk_vectors USING vec0(
        embedding float[${this.config.vectorDimensions}] distance_metric=cosine
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS index_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `);

    // An index built with another embedding size cannot be queried
    const row = MetaRowSchema.safeParse(
      this.db.prepare("SELECT value FROM index_meta WHERE key = ?").get("dimensions")
    );
    if (row.success) {
      const stored = Number(row.data.value);
      if (stored !== this.config.vectorDimensions) {
        throw new VectorDimensionMismatchError(stored, this.config.vectorDimensions);
      }
    } else {
      this.db
        .prepare("INSERT OR REPLACE INTO index_meta (key, value) VALUES (?, ?)")
        .run("dimensions", String(this.config.vectorDimensions));
    }
  }

  async upsert(chunks: readonly EmbeddedChunk[], options: UpsertOptions): Promise<void> {
    this.ensureOpen();
    for (const chunk of chunks) {
      assertDimensions(this.config.vectorDimensions, chunk.embedding);
    }

    this.transaction("upsert", () => {
      if (options.replaceExisting) {
        const paths = [...new Set(chunks.map((c) => c.sourcePath))];
        for (const sourcePath of paths) {
          this.deletePath(sourcePath);
        }
      }

      const findStmt = this.db.prepare("SELECT id FROM chunks WHERE chunk_id = ?");
      const insertChunk = this.db.prepare(`
        INSERT INTO chunks (
          chunk_id, source_path, sequence_index, start_offset, end_offset,
          start_line, end_line, content, indexed_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const insertVector = this.db.prepare(
        "INSERT INTO chunk_vectors (rowid, embedding) VALUES (?, ?)"
      );
      const indexedAt = new Date().toISOString();

      for (const chunk of chunks) {
        const existing = IdRowSchema.safeParse(findStmt.get(chunk.id));
        if (existing.success) {
          this.deleteRow(existing.data.id);
        }
        const result = insertChunk.run(
          chunk.id,
          chunk.sourcePath,
          chunk.sequenceIndex,
          chunk.startOffset,
          chunk.endOffset,
          chunk.startLine,
          chunk.endLine,
          chunk.text,
          indexedAt
        );
        insertVector.run(BigInt(result.lastInsertRowid), toBlob(chunk.embedding));
      }
    });
  }

  async deleteByPath(sourcePaths: readonly string[]): Promise<void> {
    this.ensureOpen();
    if (sourcePaths.length === 0) {
      return;
    }
    this.transaction("delete", () => {
      for (const sourcePath of sourcePaths) {
        this.deletePath(sourcePath);
      }
    });
  }

  async query(embedding: Float32Array, k: number): Promise<RetrievedChunk[]> {
    this.ensureOpen();
    assertDimensions(this.config.vectorDimensions, embedding);
    if (k <= 0) {
      return [];
    }

    let rows: unknown[];
    try {
      rows = this.db
        .prepare(
          `
        WITH knn AS (
          SELECT rowid, distance
          FROM chunk_vectors
          WHERE embedding MATCH ? AND k = ?
        )
        SELECT
          c.chunk_id, c.source_path, c.sequence_index, c.start_offset, c.end_offset,
          c.start_line, c.end_line, c.content, knn.distance
        FROM knn
        JOIN chunks c ON c.id = knn.rowid
        ORDER BY knn.distance
      `
        )
        .all(toBlob(embedding), k);
    } catch (error) {
      const cause = toError(error);
      throw new VectorStoreError(`Vector search failed: ${cause.message}`, "SEARCH_FAILED", cause);
    }

    return rows.map((raw) => {
      const row = MatchRowSchema.parse(raw);
      return {
        id: row.chunk_id,
        sourcePath: row.source_path,
        sequenceIndex: row.sequence_index,
        startOffset: row.start_offset,
        endOffset: row.end_offset,
        startLine: row.start_line,
        endLine: row.end_line,
        text: row.content,
        similarity: 1 - row.distance,
      };
    });
  }

  async reset(): Promise<void> {
    this.ensureOpen();
    this.transaction("reset", () => {
      this.db.prepare("DELETE FROM chunk_vectors").run();
      this.db.prepare("DELETE FROM chunks").run();
    });
  }

  async countChunks(): Promise<number> {
    this.ensureOpen();
    const row = CountRowSchema.parse(this.db.prepare("SELECT COUNT(*) AS count FROM chunks").get());
    return row.count;
  }

  async listChunkIds(sourcePath: string): Promise<string[]> {
    this.ensureOpen();
    return this.db
      .prepare("SELECT chunk_id FROM chunks WHERE source_path = ? ORDER BY sequence_index")
      .all(sourcePath)
      .map((raw) => ChunkIdRowSchema.parse(raw).chunk_id);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private deletePath(sourcePath: string): void {
    const ids = this.db
      .prepare("SELECT id FROM chunks WHERE source_path = ?")
      .all(sourcePath)
      .map((raw) => IdRowSchema.parse(raw).id);
    for (const id of ids) {
      this.db.prepare("DELETE FROM chunk_vectors WHERE rowid = ?").run(BigInt(id));
    }
    this.db.prepare("DELETE FROM chunks WHERE source_path = ?").run(sourcePath);
  }

  private deleteRow(id: number | bigint): void {
    this.db.prepare("DELETE FROM chunk_vectors WHERE rowid = ?").run(BigInt(id));
    this.db.prepare("DELETE FROM chunks WHERE id = ?").run(id);
  }

  private transaction(operation: string, fn: () => void): void {
    this.db.exec("BEGIN");
    try {
      fn();
      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      if (error instanceof VectorStoreError) {
        throw error;
      }
      const cause = toError(error);
      throw new VectorStoreError(
        `Vector index ${operation} failed: ${cause.message}`,
        `${operation.toUpperCase()}_FAILED`,
        cause
      );
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new VectorStoreError("Vector index is closed", "CLOSED");
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

function openSqliteVec(dbPath: string): VectorDatabase {
  const db = new Database(dbPath);
  sqliteVec.load(db);
  return {
    exec: (sql) => {
      db.exec(sql);
    },
    prepare: (sql) => {
      const stmt = db.prepare(sql);
      return {
        run: (...params) => stmt.run(...params),
        get: (...params) => stmt.get(...params),
        all: (...params) => stmt.all(...params),
      };
    },
    close: () => {
      db.close();
    },
  };
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createInMemoryVectorIndex(config: Partial<VectorIndexConfig> = {}): VectorIndex {
  return new VectorIndex({ ...config, dbPath: ":memory:" });
}

export function createVectorIndex(config: VectorIndexConfig = {}): VectorIndex {
  return new VectorIndex(config);
}
