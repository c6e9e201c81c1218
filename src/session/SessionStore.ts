/**
 * Session Store for repochat
 *
 * One JSON file per session plus a `sessions.json` index, all under the
 * sessions directory. Every mutation is written through immediately.
 *
 * @module session/SessionStore
 */

import * as fs from "fs";
import * as path from "path";
import { SessionIndexSchema, SessionSchema } from "../validation/config-schemas.js";
import {
  InvalidSessionStateError,
  SessionNotFoundError,
  StorageError,
  toError,
  type ConversationTurn,
  type Message,
  type MessageRole,
  type Session,
  type SessionId,
  type SessionSummary,
} from "../types/index.js";
import { writeJsonAtomic } from "../util/atomic-write.js";
import { renderSessionMarkdown } from "./MarkdownExporter.js";

const SESSION_ID_PATTERN = /^\d{8}_\d{6}(?:_\d+)?$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local-time YYYYMMDD_HHMMSS
 */
export function formatSessionId(date: Date): SessionId {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * The Markdown export could not be written; the session itself is intact
 */
export class SessionExportError extends StorageError {
  constructor(target: string, cause: Error) {
    super(`Failed to export session to ${target}: ${cause.message}`, target, cause);
    this.name = "SessionExportError";
  }
}

export interface SessionStoreOptions {
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class SessionStore {
  private readonly indexPath: string;
  private readonly now: () => Date;

  constructor(
    public readonly sessionsDir: string,
    options: SessionStoreOptions = {}
  ) {
    this.indexPath = path.join(sessionsDir, "sessions.json");
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  createSession(name?: string): Session {
    const createdAt = this.now();
    const index = this.readIndex();
    const taken = new Set(index.map((entry) => entry.id));

    const base = formatSessionId(createdAt);
    let id = base;
    for (let n = 2; taken.has(id) || fs.existsSync(this.sessionPath(id)); n++) {
      id = `${base}_${n}`;
    }

    const session: Session = {
      id,
      name: name?.trim() ? name.trim() : `Session ${id}`,
      createdAt: createdAt.toISOString(),
      status: "active",
      messages: [],
    };

    this.writeSession(session);
    index.push({ id, name: session.name, createdAt: session.createdAt });
    this.writeIndex(index);
    return session;
  }

  appendMessage(id: SessionId, role: MessageRole, content: string, sources?: string[]): Session {
    return this.append(id, [this.message(role, content, sources)]);
  }

  /**
   * Record a question and its answer in a single write, so a failed write
   * never leaves a question without its answer
   */
  appendTurn(id: SessionId, question: string, answer: string, sources?: string[]): Session {
    return this.append(id, [this.message("user", question), this.message("assistant", answer, sources)]);
  }

  endSession(id: SessionId): Session {
    const session = this.getSession(id);
    if (session.status === "ended") {
      return session;
    }
    session.status = "ended";
    session.endedAt = this.now().toISOString();
    this.writeSession(session);
    return session;
  }

  deleteSession(id: SessionId): void {
    if (!this.hasSession(id)) {
      throw new SessionNotFoundError(id);
    }
    fs.rmSync(this.sessionPath(id), { force: true });
    this.writeIndex(this.readIndex().filter((entry) => entry.id !== id));
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  hasSession(id: SessionId): boolean {
    return SESSION_ID_PATTERN.test(id) && fs.existsSync(this.sessionPath(id));
  }

  /**
   * @throws {SessionNotFoundError} For unknown ids
   */
  getSession(id: SessionId): Session {
    if (!this.hasSession(id)) {
      throw new SessionNotFoundError(id);
    }
    const filePath = this.sessionPath(id);
    const parsed = SessionSchema.safeParse(this.readJson(filePath));
    if (!parsed.success) {
      throw new StorageError(`Malformed session file ${filePath}`, filePath);
    }
    return parsed.data;
  }

  assertActive(id: SessionId): void {
    const session = this.getSession(id);
    if (session.status !== "active") {
      throw new InvalidSessionStateError(id, "active", session.status);
    }
  }

  /**
   * Newest first
   */
  listSessions(): SessionSummary[] {
    return this.readIndex().sort((a, b) =>
      a.createdAt === b.createdAt ? b.id.localeCompare(a.id) : b.createdAt.localeCompare(a.createdAt)
    );
  }

  /**
   * The last `turns` user/assistant pairs, oldest first
   */
  getConversationHistory(id: SessionId, turns: number): ConversationTurn[] {
    if (turns <= 0) {
      return [];
    }
    return this.getSession(id)
      .messages.slice(-turns * 2)
      .map((message) => ({ role: message.role, content: message.content }));
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  defaultExportPath(id: SessionId): string {
    return path.join(this.sessionsDir, `${id}_export.md`);
  }

  /**
   * Write the session as Markdown and return the file path
   */
  exportMarkdown(id: SessionId, outputPath?: string): string {
    const session = this.getSession(id);
    const target = path.resolve(outputPath ?? this.defaultExportPath(id));
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, renderSessionMarkdown(session, this.now()), "utf-8");
    } catch (error) {
      throw new SessionExportError(target, toError(error));
    }
    return target;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  private message(role: MessageRole, content: string, sources?: string[]): Message {
    return {
      role,
      content,
      timestamp: this.now().toISOString(),
      ...(sources && sources.length > 0 && { sources: [...sources] }),
    };
  }

  private append(id: SessionId, messages: Message[]): Session {
    const session = this.getSession(id);
    if (session.status !== "active") {
      throw new InvalidSessionStateError(id, "active", session.status);
    }
    session.messages.push(...messages);
    this.writeSession(session);
    return session;
  }

  private sessionPath(id: SessionId): string {
    return path.join(this.sessionsDir, `${id}.json`);
  }

  private writeSession(session: Session): void {
    writeJsonAtomic(this.sessionPath(session.id), session);
  }

  private readIndex(): SessionSummary[] {
    if (!fs.existsSync(this.indexPath)) {
      return [];
    }
    const parsed = SessionIndexSchema.safeParse(this.readJson(this.indexPath));
    if (!parsed.success) {
      throw new StorageError(`Malformed session index ${this.indexPath}`, this.indexPath);
    }
    return parsed.data.sessions;
  }

  private writeIndex(sessions: SessionSummary[]): void {
    writeJsonAtomic(this.indexPath, { sessions });
  }

  private readJson(filePath: string): unknown {
    try {
      return JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(`Failed to read ${filePath}: ${cause.message}`, filePath, cause);
    }
  }
}
