/**
 * Command handlers shared by the CLI entry point and the interactive menu
 */

import * as fs from "fs";
import * as path from "path";
import {
  createLocalServices,
  createRuntimeServices,
  openVectorStore,
  type RuntimeConfig,
  type RuntimeServices,
} from "../config/runtime.js";
import { HashTracker, type IngestMode } from "../ingest/HashTracker.js";
import { IngestLock } from "../ingest/IngestLock.js";
import { IngestionOrchestrator, type IngestionReport } from "../ingest/IngestionOrchestrator.js";
import { ProjectScanner } from "../ingest/ProjectScanner.js";
import { TextChunker } from "../ingest/TextChunker.js";
import { runWatchLoop } from "../ingest/WatchScheduler.js";
import type { QueryLogEntry, SessionId } from "../types/index.js";
import { toError } from "../types/index.js";
import { maskSecret, oneLine, truncate } from "../util/format.js";

// ============================================================================
// Ingest
// ============================================================================

export interface IngestCommandOptions {
  dir: string;
  incremental: boolean;
  watch: boolean;
  /** Drop the whole index and hash map before the first pass */
  reset: boolean;
  intervalSeconds: number;
  signal: AbortSignal;
}

export function formatIngestReport(report: IngestionReport): string[] {
  const lines = [
    `Ingestion ${report.cancelled ? "cancelled" : "complete"} (${report.mode}, ${(report.durationMs / 1000).toFixed(1)}s)`,
    `  Files scanned:   ${report.scanned}`,
    `  Changed:         ${report.changed.length}`,
    `  Unchanged:       ${report.unchanged}`,
    `  Deleted:         ${report.deleted.length}`,
    `  Chunks stored:   ${report.chunksStored}`,
    `  Embedding calls: ${report.embeddingCalls}`,
  ];
  if (report.skipped.length > 0) {
    lines.push(`  Skipped:         ${report.skipped.length}`);
  }
  return lines;
}

export function createIngestionOrchestrator(
  config: RuntimeConfig,
  services: RuntimeServices
): IngestionOrchestrator {
  return new IngestionOrchestrator({
    scanner: new ProjectScanner(),
    chunker: new TextChunker({
      chunkSize: config.ingest.chunkSize,
      chunkOverlap: config.ingest.chunkOverlap,
    }),
    tracker: new HashTracker(services.manifestStore),
    embeddingService: services.embeddingService,
    vectorStore: services.vectorStore,
    maxFileBytes: config.ingest.maxFileBytes,
    commitChunks: config.ingest.batchSize,
    verbose: config.repochat.verbose,
  });
}

/**
 * One ingestion pass, or a watch loop when `watch` is set. The first pass
 * honours `incremental` and `reset` (which forces a full pass); later watch
 * passes are always incremental.
 */
export async function runIngest(config: RuntimeConfig, options: IngestCommandOptions): Promise<void> {
  const root = path.resolve(options.dir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new Error(`Not a directory: ${root}`);
  }

  const services = await createRuntimeServices(config);
  const orchestrator = createIngestionOrchestrator(config, services);
  const lock = new IngestLock(services.paths.lockFile);

  const pass = async (mode: IngestMode, reset: boolean): Promise<void> => {
    const report = await lock.withLock(async () => {
      if (reset) {
        await services.vectorStore.reset();
        services.manifestStore.clear();
        console.log("[Ingest] Index cleared");
      }
      return orchestrator.ingest(root, { mode, signal: options.signal });
    });
    for (const line of formatIngestReport(report)) {
      console.log(line);
    }
  };

  try {
    const firstMode: IngestMode = options.incremental && !options.reset ? "incremental" : "full";
    if (!options.watch) {
      await pass(firstMode, options.reset);
      return;
    }

    console.log(`[Watch] Watching ${root} every ${options.intervalSeconds}s (Ctrl+C to stop)`);
    const passes = await runWatchLoop(
      (passNumber) =>
        passNumber === 1 ? pass(firstMode, options.reset) : pass("incremental", false),
      { intervalMs: options.intervalSeconds * 1000, signal: options.signal }
    );
    console.log(`[Watch] Stopped after ${passes} passes`);
  } finally {
    await services.vectorStore.close();
  }
}

// ============================================================================
// Sessions
// ============================================================================

export function listSessions(config: RuntimeConfig): void {
  const { sessionStore } = createLocalServices(config);
  const sessions = sessionStore.listSessions();
  if (sessions.length === 0) {
    console.log("No saved sessions.");
    return;
  }
  console.log(`Saved sessions (${sessions.length}):`);
  for (const session of sessions) {
    console.log(`  ${session.id}  ${session.name}  (${session.createdAt})`);
  }
}

export function viewSession(config: RuntimeConfig, id: SessionId, lastMessages = 10): void {
  const { sessionStore } = createLocalServices(config);
  const session = sessionStore.getSession(id);

  console.log(`Session: ${session.name}`);
  console.log(`  ID:       ${session.id}`);
  console.log(`  Created:  ${session.createdAt}`);
  console.log(`  Status:   ${session.status}${session.endedAt ? ` (ended ${session.endedAt})` : ""}`);
  console.log(`  Messages: ${session.messages.length}`);

  const shown = session.messages.slice(-lastMessages);
  if (shown.length < session.messages.length) {
    console.log(`  (showing last ${shown.length})`);
  }
  for (const message of shown) {
    const who = message.role === "user" ? "You" : "Assistant";
    console.log("");
    console.log(`[${message.timestamp}] ${who}: ${truncate(oneLine(message.content), 300)}`);
    if (message.sources && message.sources.length > 0) {
      console.log(`  Sources: ${message.sources.join(", ")}`);
    }
  }
}

export function exportSession(config: RuntimeConfig, id: SessionId, outputPath?: string): string {
  const { sessionStore } = createLocalServices(config);
  const written = sessionStore.exportMarkdown(id, outputPath);
  console.log(`Exported session ${id} to ${written}`);
  return written;
}

// ============================================================================
// Query history
// ============================================================================

export function printQueryEntries(entries: readonly QueryLogEntry[]): void {
  for (const entry of entries) {
    console.log(`[${entry.timestamp}] ${entry.query}`);
    console.log(`  -> ${truncate(oneLine(entry.responsePreview), 100)}`);
    if (entry.sources.length > 0) {
      console.log(`  Sources: ${entry.sources.join(", ")}`);
    }
  }
}

export function showHistory(config: RuntimeConfig, options: { limit: number; search?: string }): void {
  const { queryLog } = createLocalServices(config);
  const entries =
    options.search !== undefined
      ? queryLog.search(options.search).slice(0, options.limit)
      : queryLog.recent(options.limit);

  if (entries.length === 0) {
    console.log(options.search !== undefined ? `No queries matching "${options.search}".` : "No queries yet.");
    return;
  }
  printQueryEntries(entries);
}

// ============================================================================
// Status / settings
// ============================================================================

async function describeVectorStore(config: RuntimeConfig): Promise<string> {
  const { paths } = createLocalServices(config);
  if (!config.qdrant && !fs.existsSync(paths.vectorDbFile)) {
    return `sqlite-vec (${paths.vectorDbFile}), not built yet`;
  }
  try {
    const store = await openVectorStore(config);
    try {
      return `${store.backend}, ${await store.countChunks()} chunks`;
    } finally {
      await store.close();
    }
  } catch (error) {
    return `unavailable (${toError(error).message})`;
  }
}

export async function showStatus(config: RuntimeConfig): Promise<void> {
  const { paths, manifestStore, sessionStore, queryLog } = createLocalServices(config);
  const trackedFiles = Object.keys(manifestStore.load()).length;

  console.log("repochat settings");
  console.log(`  OpenAI API key:   ${maskSecret(config.openai.apiKey)}`);
  console.log(`  Embedding model:  ${config.openai.embeddingModel} (${config.openai.embeddingDimensions} dims)`);
  console.log(`  Chat model:       ${config.openai.chatModel} (temperature ${config.openai.temperature})`);
  console.log(`  Chunking:         ${config.ingest.chunkSize} chars, ${config.ingest.chunkOverlap} overlap`);
  console.log(`  Top-k:            ${config.chat.topK}`);
  console.log(`  History turns:    ${config.chat.historyTurns}`);
  console.log(`  Vector store:     ${await describeVectorStore(config)}`);
  console.log(`  Tracked files:    ${trackedFiles}`);
  console.log(`  Sessions:         ${sessionStore.listSessions().length}`);
  console.log(`  Logged queries:   ${queryLog.size()}`);
  console.log("");
  console.log(`Data directory: ${config.repochat.dataDir}`);
  console.log(`  ${path.basename(paths.hashFile)}    file hashes`);
  console.log(`  ${path.basename(paths.sessionsDir)}/             session records`);
  console.log(`  ${path.basename(paths.queryLogFile)}         query log`);
  console.log(`  ${path.basename(paths.vectorDbFile)}          local vector index`);
}
