import { createRuntimeServices, type RuntimeConfig } from "../config/runtime.js";
import { ChatOrchestrator } from "../chat/ChatOrchestrator.js";
import { runChatRepl, type ChatReplOptions } from "./ChatRepl.js";
import type { Prompter } from "./Prompter.js";

/**
 * Wire the runtime services into a chat loop and close them afterwards
 */
export async function startChat(
  config: RuntimeConfig,
  prompter: Prompter,
  options: ChatReplOptions
): Promise<void> {
  const services = await createRuntimeServices(config);
  try {
    const orchestrator = new ChatOrchestrator({
      embeddingService: services.embeddingService,
      vectorStore: services.vectorStore,
      chatModel: services.chatModel,
      sessionStore: services.sessionStore,
      queryLog: services.queryLog,
      topK: config.chat.topK,
      historyTurns: config.chat.historyTurns,
    });
    await runChatRepl({ orchestrator, sessionStore: services.sessionStore, prompter }, options);
  } finally {
    await services.vectorStore.close();
  }
}
