// Chat agent: answers free-form requests through a ChatClient and keeps the conversation.
// History is pruned by character count. The system message and the newest user turn always stay.
import type { OperationResult } from "../types/result.js";
import type { ChatClient, ChatMessage } from "./types.js";
import { failure, success } from "../agent/results.js";
import { logger } from "../logger.js";

export interface ChatAgentOptions {
  client: ChatClient | null;
  systemPrompt: string;
  maxHistoryChars: number;
}

export class ChatAgent {
  private readonly client: ChatClient | null;
  private readonly maxHistoryChars: number;
  private history: ChatMessage[];

  constructor(options: ChatAgentOptions) {
    this.client = options.client;
    this.maxHistoryChars = options.maxHistoryChars;
    this.history = [{ role: "system", content: options.systemPrompt }];
  }

  get messages(): readonly ChatMessage[] {
    return this.history;
  }

  get configured(): boolean {
    return this.client !== null;
  }

  updateSystemMessage(systemPrompt: string): void {
    this.history[0] = { role: "system", content: systemPrompt };
  }

  async reply(prompt: string): Promise<OperationResult> {
    const start = performance.now();
    if (!this.client) {
      return failure("chat", start, {
        code: "LLM_NOT_CONFIGURED", category: "llm",
        message: "No LLM endpoint is configured, so free-form requests cannot be answered.",
        remediation: [
          "Set llm.base_url in the config file",
          "Or export LLM_BASE_URL, e.g. http://localhost:1234/v1",
          'Type "help" to see the file and shell commands that work without one',
        ],
      });
    }

    this.history.push({ role: "user", content: prompt });
    this.prune();

    try {
      const reply = await this.client.complete([...this.history]);
      this.history.push({ role: "assistant", content: reply });
      return success("chat", start, reply.trim() || "(the assistant returned an empty reply)");
    } catch (err) {
      // Drop the unanswered turn so the next request starts from a consistent history.
      this.history.pop();
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "Error generating reply");
      return failure("chat", start, {
        code: "LLM_UNAVAILABLE", category: "llm",
        message: `Failed to get a reply from the LLM endpoint: ${message}`,
        remediation: ["Check that the server at llm.base_url is running", "Check that llm.model names a model the server provides"],
      });
    }
  }

  private prune(): void {
    while (totalChars(this.history) > this.maxHistoryChars && this.history.length > 2) {
      this.history.splice(1, 1);
    }
  }
}

function totalChars(messages: readonly ChatMessage[]): number {
  return messages.reduce((sum, message) => sum + message.content.length, 0);
}
