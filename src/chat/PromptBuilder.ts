import type { ConversationTurn, RetrievedChunk } from "../types/index.js";
import type { ChatMessage } from "./ChatModel.js";

export const SYSTEM_PROMPT = [
  "You are a helpful assistant that answers questions about a codebase.",
  "Answer using the numbered context excerpts provided with each question.",
  "Cite the file paths you rely on. If the context does not contain the answer, say so instead of guessing.",
].join("\n");

export interface PromptOptions {
  /** Prior turns, oldest first; omitted when history is disabled */
  history?: readonly ConversationTurn[];
  /** User/assistant pairs kept from the history (default: 5) */
  historyTurns?: number;
}

export function formatContext(chunks: readonly RetrievedChunk[]): string {
  return chunks
    .map(
      (chunk, i) =>
        `[${i + 1}] ${chunk.sourcePath} (lines ${chunk.startLine}-${chunk.endLine})\n${chunk.text}`
    )
    .join("\n\n");
}

/**
 * Last `turns` user/assistant pairs
 */
export function trimHistory(history: readonly ConversationTurn[], turns: number): ConversationTurn[] {
  if (turns <= 0) {
    return [];
  }
  return history.slice(-turns * 2);
}

export class PromptBuilder {
  constructor(private readonly systemPrompt: string = SYSTEM_PROMPT) {}

  build(question: string, chunks: readonly RetrievedChunk[], options: PromptOptions = {}): ChatMessage[] {
    const messages: ChatMessage[] = [
      {
        role: "system",
        content: `${this.systemPrompt}\n\nContext:\n${formatContext(chunks)}`,
      },
    ];

    if (options.history) {
      for (const turn of trimHistory(options.history, options.historyTurns ?? 5)) {
        messages.push({ role: turn.role, content: turn.content });
      }
    }

    messages.push({ role: "user", content: question });
    return messages;
  }
}
