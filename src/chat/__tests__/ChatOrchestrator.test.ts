/**
 * Tests for ChatOrchestrator
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ChatOrchestrator,
  ChatRequestError,
  NoRelevantContextError,
  uniqueSources,
} from "../ChatOrchestrator.js";
import type { ChatMessage, ChatModel } from "../ChatModel.js";
import { createEmbeddingService } from "../../search/EmbeddingService.js";
import { FakeEmbeddingProvider, InMemoryVectorStore } from "../../search/__tests__/fakes.js";
import { SessionStore } from "../../session/SessionStore.js";
import { QueryLog } from "../../session/QueryLog.js";
import { InvalidSessionStateError, type RetrievedChunk } from "../../types/index.js";

// ============================================================================
// Test Utilities
// ============================================================================

function retrieved(sourcePath: string, sequenceIndex: number): RetrievedChunk {
  return {
    id: `${sourcePath}#${sequenceIndex}`,
    sourcePath,
    text: `${sourcePath} part ${sequenceIndex}`,
    startOffset: sequenceIndex * 450,
    endOffset: sequenceIndex * 450 + 500,
    sequenceIndex,
    startLine: 1,
    endLine: 2,
    similarity: 0.8,
  };
}

const ANSWER = "Login is handled in src/auth.ts.";

describe("ChatOrchestrator", () => {
  let dir: string;
  let provider: FakeEmbeddingProvider;
  let store: InMemoryVectorStore;
  let sessions: SessionStore;
  let queryLog: QueryLog;
  let complete: Mock<(messages: ChatMessage[]) => Promise<string>>;
  let orchestrator: ChatOrchestrator;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "repochat-chat-"));
    provider = new FakeEmbeddingProvider();
    store = new InMemoryVectorStore();
    sessions = new SessionStore(path.join(dir, "sessions"));
    queryLog = new QueryLog(path.join(dir, "queries.json"));
    complete = vi.fn(async (_messages: ChatMessage[]) => ANSWER);
    const chatModel: ChatModel = { name: "fake", complete };

    vi.spyOn(store, "query").mockResolvedValue([
      retrieved("src/auth.ts", 0),
      retrieved("src/session.ts", 0),
      retrieved("src/auth.ts", 1),
    ]);

    orchestrator = new ChatOrchestrator({
      embeddingService: createEmbeddingService({
        provider: "custom",
        customProvider: provider,
        retry: { maxAttempts: 1 },
      }),
      vectorStore: store,
      chatModel,
      sessionStore: sessions,
      queryLog,
      topK: 3,
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("ask", () => {
    it("should answer with distinct sources in retrieval order", async () => {
      const result = await orchestrator.ask("How does login work?");

      expect(result.answer).toBe(ANSWER);
      expect(result.sources).toEqual(["src/auth.ts", "src/session.ts"]);
      expect(result.chunks).toHaveLength(3);
      expect(store.query).toHaveBeenCalledWith(expect.any(Float32Array), 3);
    });

    it("should send the retrieved context and the question to the model", async () => {
      await orchestrator.ask("How does login work?");

      const messages = complete.mock.calls[0]?.[0] ?? [];
      expect(messages).toHaveLength(2);
      expect(messages[0]?.content).toContain("[2] src/session.ts (lines 1-2)\nsrc/session.ts part 0");
      expect(messages[1]).toEqual({ role: "user", content: "How does login work?" });
    });

    it("should pass a per-question k to the store", async () => {
      await orchestrator.ask("q", { k: 7 });
      expect(store.query).toHaveBeenCalledWith(expect.any(Float32Array), 7);
    });

    it("should refuse to answer without context", async () => {
      vi.spyOn(store, "query").mockResolvedValue([]);

      await expect(orchestrator.ask("anything")).rejects.toThrow(NoRelevantContextError);
      expect(complete).not.toHaveBeenCalled();
    });

    it("should report an embedding failure", async () => {
      provider.failures.push(new Error("invalid key"));

      await expect(orchestrator.ask("q")).rejects.toThrow(
        "Chat request failed (embed): Failed to embed query: invalid key"
      );
    });

    it("should report a completion failure", async () => {
      complete.mockRejectedValue(new Error("model overloaded"));

      const error = await orchestrator.ask("q").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ChatRequestError);
      if (error instanceof ChatRequestError) {
        expect(error.message).toBe("Chat request failed (complete): model overloaded");
      }
    });
  });

  describe("converse", () => {
    it("should record both messages and a query log entry", async () => {
      const session = sessions.createSession("auth");

      await orchestrator.converse(session.id, "How does login work?", { useHistory: true });

      const stored = sessions.getSession(session.id);
      expect(stored.messages.map((m) => [m.role, m.content])).toEqual([
        ["user", "How does login work?"],
        ["assistant", ANSWER],
      ]);
      expect(stored.messages[1]?.sources).toEqual(["src/auth.ts", "src/session.ts"]);
      expect(queryLog.recent()).toMatchObject([
        { query: "How does login work?", responsePreview: ANSWER, sources: ["src/auth.ts", "src/session.ts"] },
      ]);
    });

    it("should include earlier turns only when history is on", async () => {
      const session = sessions.createSession();
      await orchestrator.converse(session.id, "first", { useHistory: true });

      await orchestrator.converse(session.id, "second", { useHistory: true });
      await orchestrator.converse(session.id, "third", { useHistory: false });

      const withHistory = complete.mock.calls[1]?.[0] ?? [];
      const withoutHistory = complete.mock.calls[2]?.[0] ?? [];
      expect(withHistory.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
      expect(withHistory[1]?.content).toBe("first");
      expect(withoutHistory.map((m) => m.role)).toEqual(["system", "user"]);
    });

    it("should leave the session untouched when the model fails", async () => {
      const session = sessions.createSession();
      complete.mockRejectedValue(new Error("timeout"));

      await expect(orchestrator.converse(session.id, "q", { useHistory: true })).rejects.toThrow(ChatRequestError);

      expect(sessions.getSession(session.id).messages).toEqual([]);
      expect(queryLog.size()).toBe(0);
    });

    it("should reject an ended session", async () => {
      const session = sessions.createSession();
      sessions.endSession(session.id);

      await expect(orchestrator.converse(session.id, "q", { useHistory: true })).rejects.toThrow(
        InvalidSessionStateError
      );
      expect(store.query).not.toHaveBeenCalled();
    });
  });

  it("should deduplicate sources keeping first appearance", () => {
    expect(uniqueSources([retrieved("b.ts", 0), retrieved("a.ts", 0), retrieved("b.ts", 1)])).toEqual([
      "b.ts",
      "a.ts",
    ]);
  });
});
