export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

/** Anything that can turn a conversation into the next assistant message. */
export interface ChatClient {
  complete(messages: readonly ChatMessage[]): Promise<string>;
}
