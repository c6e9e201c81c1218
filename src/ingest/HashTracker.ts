import * as crypto from "crypto";
import type { FileHashRecord, SHA256Hash } from "../types/index.js";
import type { ManifestStore } from "./ManifestStore.js";

export type IngestMode = "full" | "incremental";

export interface FileClassification {
  changed: string[];
  unchanged: string[];
  deleted: string[];
}

export function hashBytes(bytes: Buffer | string): SHA256Hash {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/**
 * Tracks which files changed since the last run.
 *
 * The working map only moves forward through recordStored/recordDeleted,
 * which callers invoke after the vector store has accepted the write. A run
 * that stops halfway therefore saves a map that matches the store.
 */
export class HashTracker {
  private stored: FileHashRecord = {};
  private working = new Map<string, SHA256Hash>();
  private mode: IngestMode = "incremental";

  constructor(private readonly manifest: ManifestStore) {}

  /**
   * Load the previous map. Both modes carry it forward, so entries survive
   * until their files are re-stored or pruned.
   */
  begin(mode: IngestMode): void {
    this.mode = mode;
    this.stored = this.manifest.load();
    this.working = new Map(Object.entries(this.stored));
  }

  classify(current: ReadonlyMap<string, SHA256Hash>, mode: IngestMode = this.mode): FileClassification {
    const changed: string[] = [];
    const unchanged: string[] = [];
    const deleted: string[] = [];

    for (const [filePath, digest] of current) {
      if (mode === "full" || this.stored[filePath] !== digest) {
        changed.push(filePath);
      } else {
        unchanged.push(filePath);
      }
    }

    for (const filePath of Object.keys(this.stored)) {
      if (!current.has(filePath)) {
        deleted.push(filePath);
      }
    }

    return { changed, unchanged, deleted: deleted.sort() };
  }

  previousDigest(filePath: string): SHA256Hash | undefined {
    return this.stored[filePath];
  }

  recordStored(filePath: string, digest: SHA256Hash): void {
    this.working.set(filePath, digest);
  }

  recordDeleted(filePath: string): void {
    this.working.delete(filePath);
  }

  save(): void {
    this.manifest.save(Object.fromEntries(this.working));
  }

  snapshot(): FileHashRecord {
    return Object.fromEntries(this.working);
  }
}
