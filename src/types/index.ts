export type {
  CommandIntent,
  FileSystemIntent,
  WriteMode,
  TerminalIntent,
  TaskIntent,
  BuiltinIntent,
  OperationKind,
} from "./intent.js";
export { isBuiltinIntent, isTerminalIntent } from "./intent.js";
export type { ErrorCategory, ErrorCode, ResultBase, SuccessResult, ErrorResult, OperationResult } from "./result.js";
export type { AgentConfig } from "./config.js";
export { AgentConfigSchema } from "./config.js";
