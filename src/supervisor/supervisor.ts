// Supervisor: the single entry point for tasks. Interprets the line, hands it to the
// agent that owns that kind of work, and stores the exchange in memory under a task id.
import type { TaskIntent } from "../types/intent.js";
import { isBuiltinIntent, isTerminalIntent } from "../types/intent.js";
import type { OperationResult } from "../types/result.js";
import type { TerminalAgent } from "../agent/terminal-agent.js";
import type { ChatAgent } from "../llm/chat-agent.js";
import type { MemoryStore } from "../memory/types.js";
import { interpret, describeIntent } from "../interpreter/interpreter.js";
import { formatResult } from "../agent/format.js";
import { AgentError, AgentErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export type AgentName = "terminal" | "assistant";

export interface DelegationOutcome {
  taskId: number;
  agent: AgentName;
  intent: TaskIntent;
  result: OperationResult;
}

export interface SupervisorDeps {
  terminal: TerminalAgent;
  chat: ChatAgent;
  memory: MemoryStore;
}

export class Supervisor {
  private readonly terminal: TerminalAgent;
  private readonly chat: ChatAgent;
  private readonly memory: MemoryStore;

  constructor(deps: SupervisorDeps) {
    this.terminal = deps.terminal;
    this.chat = deps.chat;
    this.memory = deps.memory;
  }

  async delegate(input: string): Promise<DelegationOutcome> {
    const task = input.trim();
    const intent = interpret(task);
    if (isBuiltinIntent(intent)) {
      throw new AgentError(AgentErrorCode.NOT_A_TASK, `"${task}" is a session command, not a task`, { kind: intent.kind });
    }

    logger.info({ task: describeIntent(intent) }, "Supervisor delegating task");

    let agent: AgentName;
    let result: OperationResult;
    if (isTerminalIntent(intent)) {
      agent = "terminal";
      result = await this.terminal.perform(intent);
    } else {
      agent = "assistant";
      result = await this.chat.reply(intent.prompt);
    }

    const taskId = this.memory.save(agent, task, formatResult(result));
    logger.info({ taskId, agent, status: result.status, durationMs: result.durationMs }, "Task completed");
    return { taskId, agent, intent, result };
  }
}
