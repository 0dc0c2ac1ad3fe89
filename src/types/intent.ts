/** What a single line of user input asks for. */
export type CommandIntent =
  | { kind: "empty" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "run-tests"; file: string | null }
  | { kind: "recall"; query: string }
  | FileSystemIntent
  | { kind: "run-command"; command: string; explicit: boolean }
  | { kind: "chat"; prompt: string };

export type FileSystemIntent =
  | { kind: "create-directory"; path: string }
  | { kind: "create-file"; path: string; content: string }
  | { kind: "write-file"; path: string; content: string; mode: WriteMode }
  | { kind: "list-directory"; path: string }
  | { kind: "read-file"; path: string };

export type WriteMode = "overwrite" | "append";

/** Intents the Terminal Agent performs itself. */
export type TerminalIntent = FileSystemIntent | Extract<CommandIntent, { kind: "run-command" }>;

/** Intents delegated to an agent (everything except REPL built-ins). */
export type TaskIntent = TerminalIntent | Extract<CommandIntent, { kind: "chat" }>;

/** Handled by the session itself, never delegated. */
export type BuiltinIntent = Extract<CommandIntent, { kind: "empty" | "help" | "quit" | "run-tests" | "recall" }>;

export type OperationKind = TaskIntent["kind"];

const BUILTIN_KINDS: ReadonlySet<CommandIntent["kind"]> = new Set(["empty", "help", "quit", "run-tests", "recall"]);

export function isBuiltinIntent(intent: CommandIntent): intent is BuiltinIntent {
  return BUILTIN_KINDS.has(intent.kind);
}

export function isTerminalIntent(intent: TaskIntent): intent is TerminalIntent {
  return intent.kind !== "chat";
}
