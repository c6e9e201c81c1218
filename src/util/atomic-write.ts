import * as fs from "fs";
import * as path from "path";
import { StorageError, toError } from "../types/index.js";

/**
 * Write JSON to a sibling temp file, then rename it over the target
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    const cause = toError(error);
    fs.rmSync(tmpPath, { force: true });
    throw new StorageError(`Failed to write ${filePath}: ${cause.message}`, filePath, cause);
  }
}
