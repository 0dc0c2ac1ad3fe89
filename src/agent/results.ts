import type { OperationKind } from "../types/intent.js";
import type { ErrorCategory, ErrorCode, ErrorResult, SuccessResult } from "../types/result.js";

// ── Response Builders ──────────────────────────────────────────────

export function elapsedSince(startedAt: number): number {
  return Math.round(performance.now() - startedAt);
}

export function success(
  operation: OperationKind,
  startedAt: number,
  message: string,
  extra?: { path?: string; output?: string; truncated?: boolean },
): SuccessResult {
  return { status: "success", operation, message, durationMs: elapsedSince(startedAt), ...extra };
}

export interface FailureDetails {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  remediation?: string[];
  path?: string;
  output?: string;
}

export function failure(operation: OperationKind, startedAt: number, details: FailureDetails): ErrorResult {
  const { code, category, message, remediation, ...extra } = details;
  return {
    status: "error",
    operation,
    message,
    durationMs: elapsedSince(startedAt),
    errorCode: code,
    category,
    remediation: remediation ?? [],
    ...extra,
  };
}

// ── Error Categorization ───────────────────────────────────────────

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/** Map a file-system error onto a failure for the given absolute path. */
export function describeFsError(err: unknown, absolutePath: string): FailureDetails {
  const code = isErrnoException(err) ? err.code : undefined;
  switch (code) {
    case "ENOENT":
      return {
        code: "NOT_FOUND", category: "not_found", path: absolutePath,
        message: `No such file or directory: ${absolutePath}`,
        remediation: ["Check the path spelling", "List the parent directory to see what exists"],
      };
    case "EACCES":
    case "EPERM":
      return {
        code: "PERMISSION_DENIED", category: "permission", path: absolutePath,
        message: `Permission denied: ${absolutePath}`,
        remediation: ["Check the permissions on the path and its parent directories", "Pick a location inside the working directory"],
      };
    case "EEXIST":
      return { code: "FILE_EXISTS", category: "conflict", path: absolutePath, message: `Already exists: ${absolutePath}` };
    case "ENOTDIR":
      return {
        code: "NOT_A_DIRECTORY", category: "invalid_input", path: absolutePath,
        message: `Not a directory: ${absolutePath}`,
        remediation: ["A component of the path is a file, not a directory"],
      };
    case "EISDIR":
      return { code: "IS_A_DIRECTORY", category: "invalid_input", path: absolutePath, message: `Is a directory: ${absolutePath}` };
    default:
      return {
        code: "FS_ERROR", category: "internal", path: absolutePath,
        message: err instanceof Error ? err.message : String(err),
      };
  }
}

interface OutputPattern {
  test: (output: string) => boolean;
  details: Omit<FailureDetails, "output">;
}

const OUTPUT_PATTERNS: OutputPattern[] = [
  {
    test: (s) => s.includes("permission denied") || s.includes("operation not permitted"),
    details: {
      code: "PERMISSION_DENIED", category: "permission",
      message: "Permission denied. Try running the command with elevated privileges.",
      remediation: ["Check the permissions of the files the command touches", "Re-run with sudo only if elevated privileges are really needed"],
    },
  },
  {
    test: (s) => s.includes("not found"),
    details: {
      code: "COMMAND_NOT_FOUND", category: "not_found",
      message: "Command not found. Ensure the command is typed correctly and try again.",
      remediation: ["Check the command spelling", "Verify the program is installed and on PATH"],
    },
  },
];

/** Categorize a failed command from its combined output. */
export function categorizeCommandFailure(output: string, exitCode: number): FailureDetails {
  const lower = output.toLowerCase();
  for (const pattern of OUTPUT_PATTERNS) {
    if (pattern.test(lower)) {
      return output ? { ...pattern.details, output } : { ...pattern.details };
    }
  }
  return {
    code: "COMMAND_FAILED",
    category: "command_failed",
    message: output ? `An error occurred: ${output}` : `Command exited with code ${exitCode}`,
    remediation: [],
  };
}
