import * as fs from "fs";
import { FileHashRecordSchema } from "../validation/config-schemas.js";
import { toError, type FileHashRecord } from "../types/index.js";
import { writeJsonAtomic } from "../util/atomic-write.js";

/**
 * Persists the path → SHA-256 map between ingestion runs.
 */
export class ManifestStore {
  constructor(public readonly filePath: string) {}

  /**
   * Returns an empty record when nothing has been ingested yet. A file that
   * does not parse is reported and ignored, which makes the next run
   * re-process every file.
   */
  load(): FileHashRecord {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      console.warn(`[Manifest] Ignoring unreadable ${this.filePath}: ${toError(error).message}`);
      return {};
    }

    const parsed = FileHashRecordSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[Manifest] Ignoring malformed ${this.filePath}`);
      return {};
    }
    return { ...parsed.data.files };
  }

  save(files: FileHashRecord): void {
    const sorted: FileHashRecord = {};
    for (const key of Object.keys(files).sort()) {
      const digest = files[key];
      if (digest !== undefined) {
        sorted[key] = digest;
      }
    }
    writeJsonAtomic(this.filePath, {
      version: 1,
      updatedAt: new Date().toISOString(),
      files: sorted,
    });
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}
