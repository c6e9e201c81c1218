/**
 * Core Type Definitions for repochat
 *
 * Shared by the ingestion pipeline, the vector store adapters, the chat
 * orchestrator and the session/history stores.
 *
 * @module types
 */

// ============================================================================
// Chunk Types
// ============================================================================

/**
 * A bounded text window extracted from a source file.
 * Offsets are character offsets into the file text (end exclusive).
 */
export interface Chunk {
  /** POSIX path relative to the ingested root */
  readonly sourcePath: string;
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
  /** 0-based position of the chunk within its file */
  readonly sequenceIndex: number;
  /** 1-based line of startOffset */
  readonly startLine: number;
  /** 1-based line of the last character in the chunk */
  readonly endLine: number;
}

/**
 * A chunk with its embedding, as stored in the vector store.
 */
export interface EmbeddedChunk extends Chunk {
  /** Deterministic id derived from sourcePath and sequenceIndex */
  readonly id: string;
  readonly embedding: Float32Array;
}

/**
 * A chunk returned by nearest-neighbour retrieval.
 */
export interface RetrievedChunk extends Chunk {
  readonly id: string;
  /** Cosine similarity (higher is closer) */
  readonly similarity: number;
}

/**
 * Persisted mapping of relative file path to SHA-256 content digest.
 */
export type FileHashRecord = Record<string, SHA256Hash>;

// ============================================================================
// Session Types
// ============================================================================

/**
 * Timestamp-derived session identifier (YYYYMMDD_HHMMSS, optionally suffixed)
 */
export type SessionId = string;

/**
 * Session lifecycle status. Deleted sessions no longer exist on disk.
 */
export type SessionStatus = "active" | "ended";

export type MessageRole = "user" | "assistant";

export interface Message {
  role: MessageRole;
  content: string;
  timestamp: ISOTimestamp;
  /** Source file paths cited by an assistant message */
  sources?: string[];
}

export interface Session {
  id: SessionId;
  name: string;
  createdAt: ISOTimestamp;
  status: SessionStatus;
  endedAt?: ISOTimestamp;
  messages: Message[];
}

/**
 * Entry in the session index file
 */
export interface SessionSummary {
  id: SessionId;
  name: string;
  createdAt: ISOTimestamp;
}

/**
 * A prior conversation turn handed to the prompt builder
 */
export interface ConversationTurn {
  role: MessageRole;
  content: string;
}

// ============================================================================
// Query Log Types
// ============================================================================

export interface QueryLogEntry {
  query: string;
  responsePreview: string;
  sources: string[];
  timestamp: ISOTimestamp;
}

// ============================================================================
// Utility Types
// ============================================================================

/**
 * SHA-256 hash string (64 hex characters)
 */
export type SHA256Hash = string;

/**
 * ISO 8601 timestamp string
 */
export type ISOTimestamp = string;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Base error for repochat operations
 */
export class RepoChatError extends Error {
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = "RepoChatError";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing or invalid configuration. Fatal, raised before any work begins.
 */
export class ConfigurationError extends RepoChatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

/**
 * A single file could not be read or decoded. The file is skipped.
 */
export class FileAccessError extends RepoChatError {
  constructor(filePath: string, reason: string, cause?: Error) {
    super(`Cannot read ${filePath}: ${reason}`, "FILE_ACCESS_ERROR", { filePath }, cause);
    this.name = "FileAccessError";
  }
}

/**
 * Persisted state (hash map, sessions, query log) could not be read or written
 */
export class StorageError extends RepoChatError {
  constructor(message: string, filePath: string, cause?: Error) {
    super(message, "STORAGE_ERROR", { filePath }, cause);
    this.name = "StorageError";
  }
}

export class SessionNotFoundError extends RepoChatError {
  constructor(sessionId: SessionId) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", { sessionId });
    this.name = "SessionNotFoundError";
  }
}

export class InvalidSessionStateError extends RepoChatError {
  constructor(sessionId: SessionId, expectedState: SessionStatus, actualState: SessionStatus) {
    super(
      `Invalid session state: expected ${expectedState}, got ${actualState}`,
      "INVALID_SESSION_STATE",
      { sessionId, expectedState, actualState }
    );
    this.name = "InvalidSessionStateError";
  }
}

/**
 * Wrap an unknown thrown value as an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
