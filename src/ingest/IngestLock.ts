import * as fs from "fs";
import * as path from "path";
import { RepoChatError, toError } from "../types/index.js";

/**
 * Another live process holds the ingest lock
 */
export class IngestLockError extends RepoChatError {
  constructor(lockPath: string, public readonly ownerPid: number) {
    super(
      `Another ingestion is running (pid ${ownerPid}); remove ${lockPath} if that process is gone`,
      "INGEST_LOCKED",
      { lockPath, ownerPid }
    );
    this.name = "IngestLockError";
  }
}

interface LockInfo {
  pid: number;
  acquiredAt: string;
}

/**
 * Exclusive lock file guarding the vector store and hash map during a pass
 */
export class IngestLock {
  private held = false;

  constructor(
    public readonly lockPath: string,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  acquire(): void {
    if (this.held) {
      return;
    }
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const info: LockInfo = { pid: process.pid, acquiredAt: new Date().toISOString() };
        fs.writeFileSync(this.lockPath, JSON.stringify(info), { flag: "wx" });
        this.held = true;
        return;
      } catch (error) {
        if (!isCode(error, "EEXIST")) {
          throw toError(error);
        }
      }

      const owner = this.readOwner();
      if (owner !== undefined && this.isAlive(owner)) {
        throw new IngestLockError(this.lockPath, owner);
      }
      // Stale lock left by a dead process
      console.warn(`[Lock] Reclaiming stale lock ${this.lockPath}`);
      fs.rmSync(this.lockPath, { force: true });
    }

    throw new IngestLockError(this.lockPath, this.readOwner() ?? -1);
  }

  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;
    fs.rmSync(this.lockPath, { force: true });
  }

  get isHeld(): boolean {
    return this.held;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private readOwner(): number | undefined {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.lockPath, "utf-8"));
      if (typeof parsed === "object" && parsed !== null && "pid" in parsed) {
        const pid = parsed.pid;
        return typeof pid === "number" ? pid : undefined;
      }
      return undefined;
    } catch (error) {
      if (isCode(error, "ENOENT")) {
        return undefined;
      }
      console.warn(`[Lock] Unreadable lock file: ${toError(error).message}`);
      return undefined;
    }
  }
}

function isCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return isCode(error, "EPERM");
  }
}
