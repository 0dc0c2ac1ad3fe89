export type { ChatClient, ChatMessage } from "./types.js";
export { ChatAgent, type ChatAgentOptions } from "./chat-agent.js";
export { OpenAIChatClient, type OpenAIChatClientOptions } from "./openai-client.js";
