// Wires the agent together from a validated config: memory, agents, supervisor,
// result recorder, runner and interactive session.
import { mkdirSync } from "node:fs";
import type { AgentConfig } from "./types/config.js";
import type { Executor } from "./execution/executor.js";
import type { ChatClient } from "./llm/types.js";
import type { MemoryStore } from "./memory/types.js";
import { TerminalAgent } from "./agent/terminal-agent.js";
import { ChatAgent } from "./llm/chat-agent.js";
import { OpenAIChatClient } from "./llm/openai-client.js";
import { openMemoryStore } from "./memory/index.js";
import { Supervisor } from "./supervisor/supervisor.js";
import { ResultRecorder } from "./tasks/result-recorder.js";
import { TaskRunner, type Write } from "./tasks/task-runner.js";
import { AssistantSession } from "./session/session.js";
import { resolveAgainst } from "./shared/paths.js";
import { logger } from "./logger.js";

export interface AppOverrides {
  /** `null` runs without an LLM endpoint even when one is configured. */
  chatClient?: ChatClient | null;
  executor?: Executor;
  memory?: MemoryStore;
  write?: Write;
  /** Base for relative task file paths given to "run tests". */
  cwd?: string;
}

export interface App {
  config: AgentConfig;
  memory: MemoryStore;
  terminal: TerminalAgent;
  chat: ChatAgent;
  supervisor: Supervisor;
  runner: TaskRunner;
  session: AssistantSession;
}

export function createApp(config: AgentConfig, overrides: AppOverrides = {}): App {
  mkdirSync(config.working_directory, { recursive: true });

  const write = overrides.write ?? ((text: string) => void process.stdout.write(text));
  const memory = overrides.memory ?? openMemoryStore(config);
  const terminal = TerminalAgent.fromConfig(config, overrides.executor);
  const chat = new ChatAgent({
    client: overrides.chatClient === undefined ? OpenAIChatClient.fromConfig(config) : overrides.chatClient,
    systemPrompt: config.llm.system_prompt,
    maxHistoryChars: config.llm.max_history_chars,
  });
  const supervisor = new Supervisor({ terminal, chat, memory });
  const recorder = new ResultRecorder({
    directory: resolveAgainst(config.working_directory, config.results.directory),
    enabled: config.results.save_task_results,
  });
  const runner = new TaskRunner({ supervisor, recorder, write });
  const session = new AssistantSession({
    runner,
    memory,
    defaultTaskFile: config.tests.task_file,
    write,
    cwd: overrides.cwd,
  });

  logger.info(
    { workingDirectory: config.working_directory, llm: chat.configured ? config.llm.model : null },
    "Agent ready",
  );
  return { config, memory, terminal, chat, supervisor, runner, session };
}
