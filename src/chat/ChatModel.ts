import OpenAI from "openai";
import { withRetry, type RetryOptions } from "../util/retry.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * A hosted chat-completion model
 */
export interface ChatModel {
  readonly name: string;
  complete(messages: ChatMessage[]): Promise<string>;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export interface OpenAIChatModelOptions {
  model?: string;
  temperature?: number;
  retry?: RetryOptions;
  baseUrl?: string;
}

export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly retry: RetryOptions;

  constructor(apiKey: string, options: OpenAIChatModelOptions = {}) {
    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
    });
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.3;
    this.retry = options.retry ?? {};
  }

  get name(): string {
    return this.model;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          temperature: this.temperature,
          messages: messages.map(toOpenAIMessage),
        }),
      this.retry
    );
    return response.choices[0]?.message.content ?? "";
  }
}
