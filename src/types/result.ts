import type { OperationKind } from "./intent.js";

/** Error categories used to group failures for display and remediation. */
export type ErrorCategory =
  | "permission"
  | "not_found"
  | "conflict"
  | "invalid_input"
  | "timeout"
  | "command_failed"
  | "llm"
  | "internal";

export type ErrorCode =
  | "PERMISSION_DENIED"
  | "NOT_FOUND"
  | "FILE_EXISTS"
  | "PATH_CONFLICT"
  | "NOT_A_DIRECTORY"
  | "IS_A_DIRECTORY"
  | "INVALID_PATH"
  | "FS_ERROR"
  | "COMMAND_NOT_FOUND"
  | "COMMAND_FAILED"
  | "COMMAND_TIMEOUT"
  | "LLM_NOT_CONFIGURED"
  | "LLM_UNAVAILABLE";

/** Fields present on every result. */
export interface ResultBase {
  status: "success" | "error";
  operation: OperationKind;
  message: string;
  durationMs: number;
  /** Absolute path the operation acted on, when it acted on one. */
  path?: string;
  output?: string;
}

export interface SuccessResult extends ResultBase {
  status: "success";
  truncated?: boolean;
}

export interface ErrorResult extends ResultBase {
  status: "error";
  errorCode: ErrorCode;
  category: ErrorCategory;
  remediation: string[];
}

export type OperationResult = SuccessResult | ErrorResult;
