import * as fs from "fs";
import { FileAccessError, toError } from "../types/index.js";
import { formatFileSize } from "../util/format.js";

export interface SourceFile {
  content: string;
  /** Raw bytes, hashed by the tracker */
  bytes: Buffer;
  encoding: "utf-8" | "latin1";
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Reads a source file as text. Binary content (NUL bytes), oversized files
 * and unreadable files raise FileAccessError; text that is not valid UTF-8
 * falls back to Latin-1.
 */
export async function readSourceFile(filePath: string, maxBytes: number): Promise<SourceFile> {
  let bytes: Buffer;
  try {
    const stat = await fs.promises.stat(filePath);
    if (stat.size > maxBytes) {
      throw new FileAccessError(filePath, `file too large (${formatFileSize(stat.size)})`);
    }
    bytes = await fs.promises.readFile(filePath);
  } catch (error) {
    if (error instanceof FileAccessError) {
      throw error;
    }
    const err = toError(error);
    throw new FileAccessError(filePath, err.message, err);
  }

  if (bytes.includes(0)) {
    throw new FileAccessError(filePath, "binary content");
  }

  try {
    return { content: utf8.decode(bytes), bytes, encoding: "utf-8" };
  } catch {
    return { content: bytes.toString("latin1"), bytes, encoding: "latin1" };
  }
}
