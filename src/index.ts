/**
 * repochat library entry point
 */

export * from "./types/index.js";
export * from "./ingest/index.js";
export {
  EmbeddingService,
  EmbeddingBatchError,
  EmbeddingGenerationError,
  EmbeddingConfigurationError,
  OpenAIEmbeddingProvider,
  createEmbeddingService,
  createOpenAIEmbeddingService,
} from "./search/EmbeddingService.js";
export type { EmbeddingProvider, EmbeddingServiceConfig } from "./search/EmbeddingService.js";
export { VectorStoreError, VectorDimensionMismatchError, chunkId } from "./search/VectorStore.js";
export type { VectorStore, UpsertOptions } from "./search/VectorStore.js";
export { VectorIndex, createVectorIndex, createInMemoryVectorIndex } from "./search/VectorIndex.js";
export { QdrantVectorStore, createQdrantVectorStore } from "./search/QdrantVectorStore.js";
export { ChatOrchestrator, ChatRequestError, NoRelevantContextError } from "./chat/ChatOrchestrator.js";
export type { ChatAnswer, AskOptions } from "./chat/ChatOrchestrator.js";
export { PromptBuilder } from "./chat/PromptBuilder.js";
export { OpenAIChatModel } from "./chat/ChatModel.js";
export type { ChatModel, ChatMessage } from "./chat/ChatModel.js";
export { SessionStore, SessionExportError } from "./session/SessionStore.js";
export { QueryLog } from "./session/QueryLog.js";
export { renderSessionMarkdown } from "./session/MarkdownExporter.js";
export { loadRuntimeConfig, createRuntimeServices } from "./config/runtime.js";
export type { RuntimeConfig } from "./config/runtime.js";
export { withRetry, RetryExhaustedError } from "./util/retry.js";
