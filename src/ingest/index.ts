/**
 * Ingestion layer exports
 */

export { ProjectScanner, toRelativeKey } from "./ProjectScanner.js";
export { ManifestStore } from "./ManifestStore.js";
export { TextChunker, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from "./TextChunker.js";
export { HashTracker, hashBytes } from "./HashTracker.js";
export { readSourceFile } from "./SourceReader.js";
export { IngestionOrchestrator } from "./IngestionOrchestrator.js";
export { IngestLock, IngestLockError } from "./IngestLock.js";
export { runWatchLoop } from "./WatchScheduler.js";

export type { ProjectScanOptions } from "./ProjectScanner.js";
export type { ChunkerOptions } from "./TextChunker.js";
export type { FileClassification, IngestMode } from "./HashTracker.js";
export type { SourceFile } from "./SourceReader.js";
export type {
  IngestionDeps,
  IngestionOptions,
  IngestionReport,
  SkippedFile,
} from "./IngestionOrchestrator.js";
export type { WatchOptions } from "./WatchScheduler.js";
