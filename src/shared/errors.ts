export enum AgentErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  TASK_FILE_NOT_FOUND = "TASK_FILE_NOT_FOUND",
  NOT_A_TASK = "NOT_A_TASK",
  MEMORY_UNAVAILABLE = "MEMORY_UNAVAILABLE",
}

/**
 * Raised for failures outside a task's own outcome (bad config, missing task file).
 * Operational failures of a task are reported as ErrorResult values instead.
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: AgentErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "AgentError";
    this.code = code;
    this.context = context;
  }
}
