import * as fs from "fs";
import { QueryLogSchema } from "../validation/config-schemas.js";
import { StorageError, toError, type QueryLogEntry } from "../types/index.js";
import { writeJsonAtomic } from "../util/atomic-write.js";

export const QUERY_LOG_CAPACITY = 100;
export const PREVIEW_LENGTH = 200;

/**
 * Bounded history of past questions, oldest evicted first
 */
export class QueryLog {
  constructor(
    public readonly filePath: string,
    private readonly capacity: number = QUERY_LOG_CAPACITY,
    private readonly now: () => Date = () => new Date()
  ) {}

  append(query: string, answer: string, sources: readonly string[]): QueryLogEntry {
    const entry: QueryLogEntry = {
      query,
      responsePreview: answer.slice(0, PREVIEW_LENGTH),
      sources: [...sources],
      timestamp: this.now().toISOString(),
    };
    const entries = this.load();
    entries.push(entry);
    this.save(entries.slice(-this.capacity));
    return entry;
  }

  /**
   * Newest first
   */
  recent(limit = 20): QueryLogEntry[] {
    return this.load().reverse().slice(0, Math.max(0, limit));
  }

  /**
   * Case-insensitive match over query and preview, newest first
   */
  search(keyword: string): QueryLogEntry[] {
    const needle = keyword.toLowerCase();
    return this.load()
      .reverse()
      .filter(
        (entry) =>
          entry.query.toLowerCase().includes(needle) ||
          entry.responsePreview.toLowerCase().includes(needle)
      );
  }

  size(): number {
    return this.load().length;
  }

  clear(): void {
    this.save([]);
  }

  private load(): QueryLogEntry[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(`Failed to read ${this.filePath}: ${cause.message}`, this.filePath, cause);
    }
    const parsed = QueryLogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Malformed query log ${this.filePath}`, this.filePath);
    }
    return parsed.data.queries;
  }

  private save(entries: QueryLogEntry[]): void {
    writeJsonAtomic(this.filePath, { queries: entries });
  }
}
