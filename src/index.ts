export * from "./types/index.js";
export { AgentError, AgentErrorCode } from "./shared/errors.js";
export { loadConfig, normalizeEndpoint, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH, type ConfigResult } from "./config/loader.js";
export { interpret, describeIntent } from "./interpreter/index.js";
export { ShellExecutor, type Executor, type ExecOptions, type ExecResult } from "./execution/executor.js";
export { TerminalAgent, formatResult, type TerminalAgentOptions } from "./agent/index.js";
export { ChatAgent, OpenAIChatClient, type ChatClient, type ChatMessage } from "./llm/index.js";
export { openMemoryStore, SqliteMemoryStore, InMemoryStore, type MemoryStore, type TaskRecord } from "./memory/index.js";
export { Supervisor, type AgentName, type DelegationOutcome } from "./supervisor/index.js";
export { TaskQueue, TaskRunner, ResultRecorder, loadTaskFile } from "./tasks/index.js";
export { AssistantSession, startRepl } from "./session/index.js";
export { createApp, type App, type AppOverrides } from "./app.js";
export { logger } from "./logger.js";
