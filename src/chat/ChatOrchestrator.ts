/**
 * Chat orchestration: retrieve → prompt → complete → record
 *
 * @module chat/ChatOrchestrator
 */

import type { ConversationTurn, RetrievedChunk, SessionId } from "../types/index.js";
import { RepoChatError, toError } from "../types/index.js";
import type { EmbeddingService } from "../search/EmbeddingService.js";
import type { VectorStore } from "../search/VectorStore.js";
import type { SessionStore } from "../session/SessionStore.js";
import type { QueryLog } from "../session/QueryLog.js";
import type { ChatModel } from "./ChatModel.js";
import { PromptBuilder } from "./PromptBuilder.js";

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Retrieval returned nothing; the index is empty or was never built
 */
export class NoRelevantContextError extends RepoChatError {
  constructor(query: string) {
    super(
      "No relevant context found. Run `repochat ingest` first or rephrase the question.",
      "NO_CONTEXT",
      { query }
    );
    this.name = "NoRelevantContextError";
  }
}

/**
 * The embeddings or chat API failed after retries. The turn can be retried.
 */
export class ChatRequestError extends RepoChatError {
  constructor(stage: "embed" | "complete", cause: Error) {
    super(`Chat request failed (${stage}): ${cause.message}`, "CHAT_REQUEST_FAILED", { stage }, cause);
    this.name = "ChatRequestError";
  }
}

// ============================================================================
// Types
// ============================================================================

export interface AskOptions {
  /** Prior turns, oldest first. Omit to ask without history. */
  history?: readonly ConversationTurn[];
  /** Chunks to retrieve (default: configured top-k) */
  k?: number;
}

export interface ChatAnswer {
  answer: string;
  /** Distinct source paths in retrieval order */
  sources: string[];
  chunks: RetrievedChunk[];
}

export interface ConverseOptions {
  useHistory: boolean;
  k?: number;
}

export interface ChatOrchestratorDeps {
  embeddingService: EmbeddingService;
  vectorStore: VectorStore;
  chatModel: ChatModel;
  sessionStore: SessionStore;
  queryLog: QueryLog;
  promptBuilder?: PromptBuilder;
  topK?: number;
  historyTurns?: number;
}

export function uniqueSources(chunks: readonly RetrievedChunk[]): string[] {
  return [...new Set(chunks.map((c) => c.sourcePath))];
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ChatOrchestrator {
  private readonly deps: ChatOrchestratorDeps;
  private readonly promptBuilder: PromptBuilder;
  private readonly topK: number;
  private readonly historyTurns: number;

  constructor(deps: ChatOrchestratorDeps) {
    this.deps = deps;
    this.promptBuilder = deps.promptBuilder ?? new PromptBuilder();
    this.topK = deps.topK ?? 5;
    this.historyTurns = deps.historyTurns ?? 5;
  }

  async ask(query: string, options: AskOptions = {}): Promise<ChatAnswer> {
    let embedding: Float32Array;
    try {
      embedding = await this.deps.embeddingService.embedQuery(query);
    } catch (error) {
      throw new ChatRequestError("embed", toError(error));
    }

    const chunks = await this.deps.vectorStore.query(embedding, options.k ?? this.topK);
    if (chunks.length === 0) {
      throw new NoRelevantContextError(query);
    }

    const messages = this.promptBuilder.build(query, chunks, {
      ...(options.history && { history: options.history }),
      historyTurns: this.historyTurns,
    });

    let answer: string;
    try {
      answer = await this.deps.chatModel.complete(messages);
    } catch (error) {
      throw new ChatRequestError("complete", toError(error));
    }

    return { answer, sources: uniqueSources(chunks), chunks };
  }

  /**
   * Ask within a session and record the turn. The session and query log
   * are only written after the answer arrives.
   */
  async converse(sessionId: SessionId, query: string, options: ConverseOptions): Promise<ChatAnswer> {
    const { sessionStore, queryLog } = this.deps;
    sessionStore.assertActive(sessionId);
    const history = options.useHistory
      ? sessionStore.getConversationHistory(sessionId, this.historyTurns)
      : undefined;

    const result = await this.ask(query, {
      ...(history && { history }),
      ...(options.k !== undefined && { k: options.k }),
    });

    sessionStore.appendTurn(sessionId, query, result.answer, result.sources);
    queryLog.append(query, result.answer, result.sources);
    return result;
  }
}
