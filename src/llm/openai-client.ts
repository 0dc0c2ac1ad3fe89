import OpenAI from "openai";
import type { AgentConfig } from "../types/config.js";
import type { ChatClient, ChatMessage } from "./types.js";

export interface OpenAIChatClientOptions {
  baseURL: string;
  model: string;
  apiKey?: string | null;
  timeoutMs?: number;
}

/**
 * Chat client for any OpenAI-compatible chat-completions endpoint
 * (OpenAI itself, or a local server such as LM Studio, Ollama or llama.cpp).
 */
export class OpenAIChatClient implements ChatClient {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIChatClientOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      // Local servers ignore the key, but the SDK refuses to start without one.
      apiKey: options.apiKey ?? "not-needed",
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 1,
    });
  }

  /** Returns null when no endpoint is configured. */
  static fromConfig(config: AgentConfig): OpenAIChatClient | null {
    if (!config.llm.base_url) return null;
    return new OpenAIChatClient({
      baseURL: config.llm.base_url,
      model: config.llm.model,
      apiKey: config.llm.api_key,
      timeoutMs: config.llm.timeout_seconds * 1000,
    });
  }

  async complete(messages: readonly ChatMessage[]): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [...messages],
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}
