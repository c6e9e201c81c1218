import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

const ScanDefaultsSchema = z.object({
  allowedExtensions: z.array(z.string()),
  ignoreDirs: z.array(z.string()),
  ignoreFiles: z.array(z.string()),
});

const defaults = ScanDefaultsSchema.parse(
  JSON.parse(fs.readFileSync(new URL("./extensions.json", import.meta.url), "utf-8"))
);

export const DEFAULT_ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set(defaults.allowedExtensions);
export const DEFAULT_IGNORE_DIRS: ReadonlySet<string> = new Set(defaults.ignoreDirs);
export const DEFAULT_IGNORE_FILES: ReadonlySet<string> = new Set(defaults.ignoreFiles);

export interface ProjectScanOptions {
  ignoreDirs?: ReadonlySet<string>;
  ignoreFiles?: ReadonlySet<string>;
  /** Lower-cased extensions including the dot */
  includeExtensions?: ReadonlySet<string>;
  /** Called when a directory cannot be read; the subtree is skipped */
  onSkip?: (dirPath: string, error: Error) => void;
}

/**
 * Walks a project tree and yields the files worth indexing.
 */
export class ProjectScanner {
  private readonly ignoreDirs: ReadonlySet<string>;
  private readonly ignoreFiles: ReadonlySet<string>;
  private readonly includeExtensions: ReadonlySet<string>;
  private readonly onSkip: (dirPath: string, error: Error) => void;

  constructor(options: ProjectScanOptions = {}) {
    this.ignoreDirs = options.ignoreDirs ?? DEFAULT_IGNORE_DIRS;
    this.ignoreFiles = options.ignoreFiles ?? DEFAULT_IGNORE_FILES;
    this.includeExtensions = options.includeExtensions ?? DEFAULT_ALLOWED_EXTENSIONS;
    this.onSkip =
      options.onSkip ??
      ((dirPath, error) => console.warn(`[Scanner] Cannot access ${dirPath}: ${error.message}`));
  }

  /**
   * Lazily yield absolute paths of candidate files under `rootDir`, in
   * name order. Symbolic links are not followed.
   */
  async *crawl(rootDir: string): AsyncGenerator<string> {
    yield* this.walk(path.resolve(rootDir));
  }

  /**
   * Collect every crawled path
   */
  async collect(rootDir: string): Promise<string[]> {
    const files: string[] = [];
    for await (const file of this.crawl(rootDir)) {
      files.push(file);
    }
    return files;
  }

  shouldProcessFile(fileName: string): boolean {
    if (this.ignoreFiles.has(fileName)) {
      return false;
    }
    return this.includeExtensions.has(path.extname(fileName).toLowerCase());
  }

  private async *walk(current: string): AsyncGenerator<string> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(current, { withFileTypes: true });
    } catch (error) {
      this.onSkip(current, error instanceof Error ? error : new Error(String(error)));
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (this.ignoreDirs.has(entry.name)) {
          continue;
        }
        yield* this.walk(fullPath);
      } else if (entry.isFile() && this.shouldProcessFile(entry.name)) {
        yield fullPath;
      }
    }
  }
}

/**
 * Relative path with POSIX separators, used as the stable file key
 */
export function toRelativeKey(rootPath: string, filePath: string): string {
  return path.relative(rootPath, filePath).split(path.sep).join(path.posix.sep);
}
