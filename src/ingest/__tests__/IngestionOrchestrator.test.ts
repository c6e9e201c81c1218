/**
 * Tests for IngestionOrchestrator
 *
 * Real files in a temp directory, a fake embedding provider and an
 * in-memory vector store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { IngestionOrchestrator, type IngestionDeps } from "../IngestionOrchestrator.js";
import { HashTracker, hashBytes } from "../HashTracker.js";
import { ManifestStore } from "../ManifestStore.js";
import {
  EmbeddingBatchError,
  EmbeddingService,
  createEmbeddingService,
} from "../../search/EmbeddingService.js";
import { FakeEmbeddingProvider, InMemoryVectorStore } from "../../search/__tests__/fakes.js";

// ============================================================================
// Test Utilities
// ============================================================================

interface Harness {
  provider: FakeEmbeddingProvider;
  service: EmbeddingService;
  store: InMemoryVectorStore;
  manifest: ManifestStore;
  orchestrator(overrides?: Partial<IngestionDeps>): IngestionOrchestrator;
}

function createHarness(stateDir: string, provider = new FakeEmbeddingProvider()): Harness {
  const service = createEmbeddingService({
    provider: "custom",
    customProvider: provider,
    retry: { maxAttempts: 1 },
  });
  const store = new InMemoryVectorStore(provider.dimensions);
  const manifest = new ManifestStore(path.join(stateDir, "file-hashes.json"));
  return {
    provider,
    service,
    store,
    manifest,
    orchestrator: (overrides = {}) =>
      new IngestionOrchestrator({
        tracker: new HashTracker(manifest),
        embeddingService: service,
        vectorStore: store,
        ...overrides,
      }),
  };
}

// ============================================================================
// Tests
// ============================================================================

describe("IngestionOrchestrator", () => {
  let tmp: string;
  let root: string;
  let h: Harness;

  function write(relative: string, content: string): void {
    const full = path.join(root, relative);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "repochat-ingest-"));
    root = path.join(tmp, "project");
    write("a.ts", "export const a = 1;\n");
    write("b.md", "# Notes\n");
    write("empty.txt", "   ");
    h = createHarness(path.join(tmp, "state"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  describe("full mode", () => {
    it("should index every readable file and record every digest", async () => {
      const report = await h.orchestrator().ingest(root, { mode: "full" });

      expect(report.scanned).toBe(3);
      expect(report.changed).toEqual(["a.ts", "b.md", "empty.txt"]);
      expect(report.chunksStored).toBe(2);
      expect(report.embeddingCalls).toBe(1);
      expect(report.cancelled).toBe(false);
      expect(h.store.paths()).toEqual(["a.ts", "b.md"]);
      expect(h.store.textsFor("a.ts")).toEqual(["export const a = 1;\n"]);
      expect(h.manifest.load()).toEqual({
        "a.ts": hashBytes("export const a = 1;\n"),
        "b.md": hashBytes("# Notes\n"),
        "empty.txt": hashBytes("   "),
      });
    });

    it("should clear chunks of files that no longer exist", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      fs.rmSync(path.join(root, "b.md"));

      const report = await h.orchestrator().ingest(root, { mode: "full" });

      expect(report.deleted).toEqual(["b.md"]);
      expect(h.store.paths()).toEqual(["a.ts"]);
      expect(Object.keys(h.manifest.load())).toEqual(["a.ts", "empty.txt"]);
    });

    it("should replace a file's chunks when it is re-indexed", async () => {
      write("a.ts", "z".repeat(1200));
      await h.orchestrator().ingest(root, { mode: "full" });

      write("a.ts", "short now\n");
      await h.orchestrator().ingest(root, { mode: "full" });

      expect(h.store.textsFor("a.ts")).toEqual(["short now\n"]);
    });

    it("should keep the existing index when a re-run cannot embed", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      const digestsBefore = h.manifest.load();
      h.provider.failures.push(new Error("embeddings API unavailable"));

      await expect(h.orchestrator().ingest(root, { mode: "full" })).rejects.toThrow(EmbeddingBatchError);

      expect(h.store.paths()).toEqual(["a.ts", "b.md"]);
      expect(h.store.textsFor("a.ts")).toEqual(["export const a = 1;\n"]);
      expect(h.manifest.load()).toEqual(digestsBefore);
    });

    it("should keep removed files until every group has been stored", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      fs.rmSync(path.join(root, "b.md"));
      h.provider.failures.push(new Error("embeddings API unavailable"));

      await expect(h.orchestrator().ingest(root, { mode: "full" })).rejects.toThrow(EmbeddingBatchError);

      expect(h.store.paths()).toEqual(["a.ts", "b.md"]);
      expect(Object.keys(h.manifest.load()).sort()).toEqual(["a.ts", "b.md", "empty.txt"]);
    });
  });

  describe("incremental mode", () => {
    it("should make no embedding calls when nothing changed", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      const requestsBefore = h.provider.requests.length;

      const report = await h.orchestrator().ingest(root, { mode: "incremental" });

      expect(report.changed).toEqual([]);
      expect(report.unchanged).toBe(3);
      expect(report.deleted).toEqual([]);
      expect(report.embeddingCalls).toBe(0);
      expect(h.provider.requests).toHaveLength(requestsBefore);
    });

    it("should re-embed changed and new files and drop deleted ones", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      write("a.ts", "export const a = 2;\n");
      write("c.ts", "export const c = 3;\n");
      fs.rmSync(path.join(root, "b.md"));

      const report = await h.orchestrator().ingest(root, { mode: "incremental" });

      expect(report.changed).toEqual(["a.ts", "c.ts"]);
      expect(report.unchanged).toBe(1);
      expect(report.deleted).toEqual(["b.md"]);
      expect(h.store.paths()).toEqual(["a.ts", "c.ts"]);
      expect(h.store.textsFor("a.ts")).toEqual(["export const a = 2;\n"]);
      expect(h.manifest.load()["b.md"]).toBeUndefined();
      expect(h.manifest.load()["a.ts"]).toBe(hashBytes("export const a = 2;\n"));
    });

    it("should leave no stale chunks when a file shrinks", async () => {
      write("a.ts", "z".repeat(1200));
      await h.orchestrator().ingest(root, { mode: "full" });
      expect(h.store.textsFor("a.ts")).toHaveLength(3);

      write("a.ts", "short now\n");
      await h.orchestrator().ingest(root, { mode: "incremental" });

      expect(h.store.textsFor("a.ts")).toEqual(["short now\n"]);
    });

    it("should remove chunks of a file that became empty", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      write("b.md", "\n\n");

      const report = await h.orchestrator().ingest(root, { mode: "incremental" });

      expect(report.changed).toEqual(["b.md"]);
      expect(h.store.paths()).toEqual(["a.ts"]);
      expect(h.manifest.load()["b.md"]).toBe(hashBytes("\n\n"));
    });

    it("should keep an unreadable file's chunks and digest", async () => {
      await h.orchestrator().ingest(root, { mode: "full" });
      const before = h.manifest.load()["a.ts"];

      const report = await h.orchestrator({ maxFileBytes: 15 }).ingest(root, { mode: "incremental" });

      expect(report.skipped.map((s) => s.path)).toEqual(["a.ts"]);
      expect(report.deleted).toEqual([]);
      expect(h.store.paths()).toEqual(["a.ts", "b.md"]);
      expect(h.manifest.load()["a.ts"]).toBe(before);
    });
  });

  describe("failure handling", () => {
    it("should save digests only for groups the store accepted", async () => {
      h.store.failUpsertsAfter = 1;

      await expect(
        h.orchestrator({ commitChunks: 1 }).ingest(root, { mode: "full" })
      ).rejects.toThrow("store unavailable");

      expect(Object.keys(h.manifest.load())).toEqual(["a.ts"]);
      expect(h.store.paths()).toEqual(["a.ts"]);

      h.store.failUpsertsAfter = null;
      const retry = await h.orchestrator().ingest(root, { mode: "incremental" });

      expect(retry.changed).toEqual(["b.md", "empty.txt"]);
      expect(h.store.paths()).toEqual(["a.ts", "b.md"]);
    });

    it("should stop between groups when cancelled", async () => {
      const controller = new AbortController();
      class AbortingProvider extends FakeEmbeddingProvider {
        override async embed(texts: string[]): Promise<Float32Array[]> {
          controller.abort();
          return super.embed(texts);
        }
      }
      const harness = createHarness(path.join(tmp, "state-cancel"), new AbortingProvider());

      const report = await harness
        .orchestrator({ commitChunks: 1 })
        .ingest(root, { mode: "full", signal: controller.signal });

      expect(report.cancelled).toBe(true);
      expect(report.chunksStored).toBe(1);
      expect(harness.store.paths()).toEqual(["a.ts"]);
      expect(Object.keys(harness.manifest.load())).toEqual(["a.ts"]);
    });
  });
});
