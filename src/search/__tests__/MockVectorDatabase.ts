/**
 * Mock VectorDatabase for testing
 *
 * Simulates the `chunks` table and the vec0 `chunk_vectors` table in memory,
 * matching statements by their SQL text. BEGIN/ROLLBACK restore a snapshot.
 *
 * @module search/__tests__/MockVectorDatabase
 */

import type { VectorDatabase, VectorStatement } from "../VectorIndex.js";

// ============================================================================
// Mock Types
// ============================================================================

interface MockChunkRow {
  id: number;
  chunk_id: string;
  source_path: string;
  sequence_index: number;
  start_offset: number;
  end_offset: number;
  start_line: number;
  end_line: number;
  content: string;
  indexed_at: string;
}

interface MockState {
  closed: boolean;
  nextId: number;
  chunks: Map<number, MockChunkRow>;
  vectors: Map<number, Float32Array>;
  meta: Map<string, string>;
  snapshot: Omit<MockState, "snapshot" | "closed"> | null;
  /** Fail the next INSERT INTO chunks after this many successes */
  failInsertsAfter: number | null;
}

function toNumber(value: unknown): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  throw new Error(`Expected a number, got ${typeof value}`);
}

function toText(value: unknown): string {
  if (typeof value !== "string") throw new Error(`Expected a string, got ${typeof value}`);
  return value;
}

function toVector(value: unknown): Float32Array {
  if (!Buffer.isBuffer(value)) throw new Error("Expected an embedding blob");
  const copy = new Uint8Array(value.byteLength);
  copy.set(value);
  return new Float32Array(copy.buffer);
}

function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

// ============================================================================
// Mock Statement
// ============================================================================

class MockStatement implements VectorStatement {
  constructor(
    private readonly sql: string,
    private readonly state: MockState
  ) {}

  run(...params: unknown[]): { changes: number; lastInsertRowid: number } {
    this.ensureOpen();
    const s = this.state;

    if (this.sql.includes("INSERT INTO chunks")) {
      if (s.failInsertsAfter !== null) {
        if (s.failInsertsAfter === 0) throw new Error("disk I/O error");
        s.failInsertsAfter--;
      }
      const id = s.nextId++;
      s.chunks.set(id, {
        id,
        chunk_id: toText(params[0]),
        source_path: toText(params[1]),
        sequence_index: toNumber(params[2]),
        start_offset: toNumber(params[3]),
        end_offset: toNumber(params[4]),
        start_line: toNumber(params[5]),
        end_line: toNumber(params[6]),
        content: toText(params[7]),
        indexed_at: toText(params[8]),
      });
      return { changes: 1, lastInsertRowid: id };
    }

    if (this.sql.includes("INSERT INTO chunk_vectors")) {
      if (typeof params[0] !== "bigint") throw new Error("vec0 rowid must be an integer");
      s.vectors.set(toNumber(params[0]), toVector(params[1]));
      return { changes: 1, lastInsertRowid: toNumber(params[0]) };
    }

    if (this.sql.includes("INSERT OR REPLACE INTO index_meta")) {
      s.meta.set(toText(params[0]), toText(params[1]));
      return { changes: 1, lastInsertRowid: 0 };
    }

    if (this.sql.includes("DELETE FROM chunk_vectors WHERE rowid = ?")) {
      const deleted = s.vectors.delete(toNumber(params[0]));
      return { changes: deleted ? 1 : 0, lastInsertRowid: 0 };
    }

    if (this.sql.includes("DELETE FROM chunks WHERE source_path = ?")) {
      const sourcePath = toText(params[0]);
      let changes = 0;
      for (const [id, row] of s.chunks) {
        if (row.source_path === sourcePath) {
          s.chunks.delete(id);
          changes++;
        }
      }
      return { changes, lastInsertRowid: 0 };
    }

    if (this.sql.includes("DELETE FROM chunks WHERE id = ?")) {
      const deleted = s.chunks.delete(toNumber(params[0]));
      return { changes: deleted ? 1 : 0, lastInsertRowid: 0 };
    }

    if (this.sql.includes("DELETE FROM chunk_vectors")) {
      const changes = s.vectors.size;
      s.vectors.clear();
      return { changes, lastInsertRowid: 0 };
    }

    if (this.sql.includes("DELETE FROM chunks")) {
      const changes = s.chunks.size;
      s.chunks.clear();
      return { changes, lastInsertRowid: 0 };
    }

    return { changes: 0, lastInsertRowid: 0 };
  }

  get(...params: unknown[]): unknown {
    this.ensureOpen();
    const s = this.state;

    if (this.sql.includes("FROM index_meta")) {
      const value = s.meta.get(toText(params[0]));
      return value === undefined ? undefined : { value };
    }

    if (this.sql.includes("COUNT(*)")) {
      return { count: s.chunks.size };
    }

    if (this.sql.includes("WHERE chunk_id = ?")) {
      const chunkId = toText(params[0]);
      for (const row of s.chunks.values()) {
        if (row.chunk_id === chunkId) return { id: row.id };
      }
      return undefined;
    }

    return undefined;
  }

  all(...params: unknown[]): unknown[] {
    this.ensureOpen();
    const s = this.state;

    if (this.sql.includes("embedding MATCH")) {
      const query = toVector(params[0]);
      const k = toNumber(params[1]);
      const scored: Array<{ rowid: number; distance: number }> = [];
      for (const [rowid, vector] of s.vectors) {
        scored.push({ rowid, distance: 1 - cosineSimilarity(query, vector) });
      }
      return scored
        .sort((a, b) => a.distance - b.distance)
        .slice(0, k)
        .flatMap(({ rowid, distance }) => {
          const row = s.chunks.get(rowid);
          return row ? [{ ...row, distance }] : [];
        });
    }

    if (this.sql.includes("SELECT id FROM chunks WHERE source_path = ?")) {
      const sourcePath = toText(params[0]);
      return [...s.chunks.values()]
        .filter((row) => row.source_path === sourcePath)
        .map((row) => ({ id: row.id }));
    }

    if (this.sql.includes("SELECT chunk_id FROM chunks WHERE source_path = ?")) {
      const sourcePath = toText(params[0]);
      return [...s.chunks.values()]
        .filter((row) => row.source_path === sourcePath)
        .sort((a, b) => a.sequence_index - b.sequence_index)
        .map((row) => ({ chunk_id: row.chunk_id }));
    }

    return [];
  }

  private ensureOpen(): void {
    if (this.state.closed) {
      throw new Error("Database is closed");
    }
  }
}

// ============================================================================
// Mock Database
// ============================================================================

export class MockVectorDatabase implements VectorDatabase {
  private readonly state: MockState = {
    closed: false,
    nextId: 1,
    chunks: new Map(),
    vectors: new Map(),
    meta: new Map(),
    snapshot: null,
    failInsertsAfter: null,
  };

  readonly executed: string[] = [];

  exec(sql: string): void {
    const statement = sql.trim();
    this.executed.push(statement);
    const s = this.state;

    if (statement === "BEGIN") {
      s.snapshot = {
        nextId: s.nextId,
        chunks: new Map(s.chunks),
        vectors: new Map(s.vectors),
        meta: new Map(s.meta),
        failInsertsAfter: s.failInsertsAfter,
      };
    } else if (statement === "COMMIT") {
      s.snapshot = null;
    } else if (statement === "ROLLBACK" && s.snapshot) {
      s.nextId = s.snapshot.nextId;
      s.chunks = s.snapshot.chunks;
      s.vectors = s.snapshot.vectors;
      s.meta = s.snapshot.meta;
      s.snapshot = null;
    }
  }

  prepare(sql: string): VectorStatement {
    if (this.state.closed) {
      throw new Error("Database is closed");
    }
    return new MockStatement(sql, this.state);
  }

  close(): void {
    this.state.closed = true;
  }

  // Test helpers

  isClosed(): boolean {
    return this.state.closed;
  }

  chunkRowCount(): number {
    return this.state.chunks.size;
  }

  vectorRowCount(): number {
    return this.state.vectors.size;
  }

  setMeta(key: string, value: string): void {
    this.state.meta.set(key, value);
  }

  failInsertsAfter(count: number | null): void {
    this.state.failInsertsAfter = count;
  }
}

export function createMockVectorDatabase(): MockVectorDatabase {
  return new MockVectorDatabase();
}
