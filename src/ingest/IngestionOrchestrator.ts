/**
 * IngestionOrchestrator: crawl → hash → chunk → embed → store
 *
 * The vector store is written first and the hash map second, one group of
 * files at a time, so an interrupted run re-processes at most the group in
 * flight and never leaves a stale digest behind. Full runs replace chunks
 * file by file; nothing stored earlier is dropped before its replacement
 * has been embedded.
 */

import * as path from "path";
import type { Chunk, SHA256Hash } from "../types/index.js";
import { FileAccessError } from "../types/index.js";
import type { EmbeddingService } from "../search/EmbeddingService.js";
import { toEmbeddedChunk, type VectorStore } from "../search/VectorStore.js";
import { ProjectScanner, toRelativeKey } from "./ProjectScanner.js";
import { TextChunker } from "./TextChunker.js";
import { HashTracker, hashBytes, type IngestMode } from "./HashTracker.js";
import { readSourceFile } from "./SourceReader.js";

export interface IngestionDeps {
  scanner?: ProjectScanner;
  chunker?: TextChunker;
  tracker: HashTracker;
  embeddingService: EmbeddingService;
  vectorStore: VectorStore;
  /** Files larger than this are skipped (default: 10 MiB) */
  maxFileBytes?: number;
  /** Chunks embedded and committed together (default: the service batch size, 96) */
  commitChunks?: number;
  verbose?: boolean;
}

export interface IngestionOptions {
  mode: IngestMode;
  /** Stops the run between commit groups */
  signal?: AbortSignal;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface IngestionReport {
  mode: IngestMode;
  root: string;
  scanned: number;
  changed: string[];
  unchanged: number;
  deleted: string[];
  chunksStored: number;
  embeddingCalls: number;
  skipped: SkippedFile[];
  cancelled: boolean;
  durationMs: number;
}

interface PendingFile {
  key: string;
  digest: SHA256Hash;
  chunks: Chunk[];
}

const PROGRESS_EVERY = 10;

export class IngestionOrchestrator {
  private readonly scanner: ProjectScanner;
  private readonly chunker: TextChunker;
  private readonly tracker: HashTracker;
  private readonly embeddingService: EmbeddingService;
  private readonly vectorStore: VectorStore;
  private readonly maxFileBytes: number;
  private readonly commitChunks: number;
  private readonly verbose: boolean;

  constructor(deps: IngestionDeps) {
    this.scanner = deps.scanner ?? new ProjectScanner();
    this.chunker = deps.chunker ?? new TextChunker();
    this.tracker = deps.tracker;
    this.embeddingService = deps.embeddingService;
    this.vectorStore = deps.vectorStore;
    this.maxFileBytes = deps.maxFileBytes ?? 10 * 1024 * 1024;
    this.commitChunks = deps.commitChunks ?? 96;
    this.verbose = deps.verbose ?? false;
  }

  /**
   * Run one ingestion pass over `rootDir`.
   *
   * Throws EmbeddingBatchError or VectorStoreError when a group cannot be
   * stored; the hash map is saved with every group committed before it.
   */
  async ingest(rootDir: string, options: IngestionOptions): Promise<IngestionReport> {
    const startedAt = Date.now();
    const root = path.resolve(rootDir);
    const { mode, signal } = options;
    const callsBefore = this.embeddingService.callCount;

    this.tracker.begin(mode);

    // Step 1: crawl, read and hash
    const digests = new Map<string, SHA256Hash>();
    const contents = new Map<string, string>();
    const unreadable = new Set<string>();
    const skipped: SkippedFile[] = [];
    let scanned = 0;

    for await (const filePath of this.scanner.crawl(root)) {
      const key = toRelativeKey(root, filePath);
      scanned++;
      try {
        const file = await readSourceFile(filePath, this.maxFileBytes);
        const digest = hashBytes(file.bytes);
        digests.set(key, digest);
        if (mode === "full" || this.tracker.previousDigest(key) !== digest) {
          contents.set(key, file.content);
        }
      } catch (error) {
        if (!(error instanceof FileAccessError)) {
          throw error;
        }
        console.warn(`[Ingest] Skipping ${key}: ${error.message}`);
        skipped.push({ path: key, reason: error.message });
        unreadable.add(key);
      }
      if (scanned % PROGRESS_EVERY === 0) {
        console.log(`[Ingest] Scanned ${scanned} files...`);
      }
    }

    // Step 2: classify against the stored map
    const classification = this.tracker.classify(digests, mode);
    // A file that exists but could not be read keeps its previous entry
    const deleted = classification.deleted.filter((key) => !unreadable.has(key));
    const report: IngestionReport = {
      mode,
      root,
      scanned,
      changed: classification.changed,
      unchanged: classification.unchanged.length,
      deleted,
      chunksStored: 0,
      embeddingCalls: 0,
      skipped,
      cancelled: false,
      durationMs: 0,
    };

    console.log(
      `[Ingest] ${mode} pass: ${classification.changed.length} changed, ` +
        `${classification.unchanged.length} unchanged, ${deleted.length} deleted`
    );

    try {
      // Step 3: incremental runs prune removed files before re-embedding
      if (mode === "incremental") {
        await this.prune(deleted);
      }

      // Step 4: chunk, embed and store changed files in commit groups
      let group: PendingFile[] = [];
      let groupSize = 0;
      let processed = 0;

      for (const key of classification.changed) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }

        const digest = digests.get(key);
        const content = contents.get(key);
        if (digest === undefined || content === undefined) {
          continue;
        }
        const chunks = this.chunker.chunk(key, content);
        contents.delete(key);
        group.push({ key, digest, chunks });
        groupSize += chunks.length;
        processed++;

        if (groupSize >= this.commitChunks) {
          report.chunksStored += await this.commit(group);
          group = [];
          groupSize = 0;
        }
        if (processed % PROGRESS_EVERY === 0) {
          console.log(`[Ingest] Processed ${processed}/${classification.changed.length} files`);
        }
      }

      if (group.length > 0 && !report.cancelled) {
        report.chunksStored += await this.commit(group);
      }

      // Step 5: full runs prune only once every group has been stored
      if (mode === "full" && !report.cancelled) {
        await this.prune(deleted);
      }
    } finally {
      this.tracker.save();
      report.embeddingCalls = this.embeddingService.callCount - callsBefore;
    }

    report.durationMs = Date.now() - startedAt;
    return report;
  }

  private async prune(deleted: string[]): Promise<void> {
    if (deleted.length === 0) {
      return;
    }
    await this.vectorStore.deleteByPath(deleted);
    for (const key of deleted) {
      this.tracker.recordDeleted(key);
    }
    this.tracker.save();
  }

  /**
   * Embed and store one group, replacing each file's previous chunks, then
   * record its digests
   */
  private async commit(group: PendingFile[]): Promise<number> {
    const chunks = group.flatMap((file) => file.chunks);
    const vectors = await this.embeddingService.embedDocuments(
      chunks.map((c) => c.text),
      (batchIndex, totalBatches, embedded) => {
        console.log(`[Ingest] Embedded batch ${batchIndex + 1}/${totalBatches} (${embedded} chunks)`);
      }
    );

    const embedded = chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (vector === undefined) {
        throw new Error(`Missing embedding for chunk ${i} of ${chunk.sourcePath}`);
      }
      return toEmbeddedChunk(chunk, vector);
    });

    // Changed files that became empty still lose their old chunks
    const emptied = group.filter((file) => file.chunks.length === 0).map((file) => file.key);
    if (emptied.length > 0) {
      await this.vectorStore.deleteByPath(emptied);
    }
    if (embedded.length > 0) {
      await this.vectorStore.upsert(embedded, { replaceExisting: true });
    }

    for (const file of group) {
      this.tracker.recordStored(file.key, file.digest);
    }
    this.tracker.save();

    if (this.verbose) {
      console.log(`[Ingest] Stored ${embedded.length} chunks from ${group.length} files`);
    }
    return embedded.length;
  }
}
