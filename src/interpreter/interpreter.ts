// Command interpreter: maps one line of user text onto a CommandIntent.
// Pure function of its input, no I/O. Rules run in a fixed order and the first match wins:
// built-ins → explicit shell → write/append → create dir → create file → read → list
// → implicit shell → chat. Keywords are case-insensitive; paths and content keep their case.
import type { CommandIntent, FileSystemIntent } from "../types/intent.js";
import starters from "./command-starters.json";
import { cleanPathToken, hasPathShape, isSingleToken, normalizeDirectoryPhrase, unquote } from "./tokens.js";

const EXPLICIT_SHELL_PREFIXES = ["run command ", "/run ", "/cmd ", "/command ", "/shell ", "/sh "];

const COMMAND_STARTERS: ReadonlySet<string> = new Set(starters.commands);
// English words that are also commands; they only count with flags, paths or shell operators.
const AMBIGUOUS_STARTERS: ReadonlySet<string> = new Set(starters.ambiguous);

const QUOTED_OR_WORD = `("[^"]+"|'[^']+'|\\S+)`;

const WRITE_WITH_SEPARATOR = /^(write|append)\s+(.+?)\s*::\s*([\s\S]+)$/i;
const WRITE_TO_PATH = new RegExp(`^(write|save|append)\\s+([\\s\\S]+?)\\s+(?:to|into|in)\\s+${QUOTED_OR_WORD}$`, "i");
const CREATE_DIRECTORY = /^(?:create|make)\s+(?:(?:a|an|new|the)\s+)*(?:directory|folder|dir)\s+(?:(?:named|called)\s+)?(.+)$/i;
const MKDIR = /^mkdir\s+(?:-p\s+)?(.+)$/i;
const CREATE_FILE =
  /^(?:create|make|new)\s+(?:(?:a|an|new|empty|the)\s+)*file\s+(?:(?:named|called)\s+)?(.+?)(?:\s+(?:with\s+(?:the\s+)?content|containing)(?:\s*:\s*|\s+|$)([\s\S]*))?$/i;
const TOUCH = /^touch\s+(.+)$/i;
const READ_FILE = /^(?:read|show|display|print|open)\s+(?:(?:me|the)\s+)*(?:contents?\s+of\s+)?(?:the\s+)?file\s+(.+)$/i;
const READ_CONTENTS = /^(?:read|show|display|print|open)\s+(?:(?:me|the)\s+)*contents?\s+of\s+(.+)$/i;
const READ_BARE = /^read\s+(.+)$/i;
const LIST_FILES =
  /^list\s+(?:(?:all|the)\s+)*(?:files|contents|entries)(?:\s+(?:in|of|inside)\b)?(?:\s+(?:the\s+)?(?:directory|folder|dir)\b)?(?:\s+(.+))?$/i;
const LIST_DIRECTORY = /^list\s+(?:the\s+)?(?:directory|folder|dir)\b(?:\s+(.+))?$/i;
const LIST_BARE = /^list(?:\s+(.+))?$/i;

export function interpret(line: string): CommandIntent {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "empty" };

  const builtin = matchBuiltin(trimmed);
  if (builtin) return builtin;

  const explicit = matchExplicitShell(trimmed);
  if (explicit) return explicit;

  const body = trimmed.replace(/^please\s+/i, "");
  const fsIntent =
    matchWrite(body) ?? matchCreateDirectory(body) ?? matchCreateFile(body) ?? matchReadFile(body) ?? matchList(body);
  if (fsIntent) return fsIntent;

  if (looksLikeShellCommand(trimmed)) {
    return { kind: "run-command", command: trimmed, explicit: false };
  }

  return { kind: "chat", prompt: trimmed };
}

function matchBuiltin(trimmed: string): CommandIntent | null {
  const collapsed = trimmed.replace(/\s+/g, " ");
  const lower = collapsed.toLowerCase();

  if (lower === "help" || lower === "?") return { kind: "help" };
  if (lower === "quit" || lower === "exit") return { kind: "quit" };
  if (lower === "run tests") return { kind: "run-tests", file: null };

  const runTests = collapsed.match(/^run tests (.+)$/i);
  if (runTests) {
    const file = cleanPathToken(runTests[1]);
    if (file) return { kind: "run-tests", file };
  }

  const recall = collapsed.match(/^recall (.+)$/i);
  if (recall) return { kind: "recall", query: recall[1].trim() };

  return null;
}

function matchExplicitShell(trimmed: string): CommandIntent | null {
  let command: string | null = null;

  if (trimmed.startsWith("!")) {
    command = trimmed.slice(1).trim();
  } else if (trimmed.startsWith("$ ")) {
    command = trimmed.slice(2).trim();
  } else {
    const lower = trimmed.toLowerCase();
    const prefix = EXPLICIT_SHELL_PREFIXES.find((p) => lower.startsWith(p));
    if (prefix) command = trimmed.slice(prefix.length).trim();
  }

  return command ? { kind: "run-command", command, explicit: true } : null;
}

function matchWrite(body: string): FileSystemIntent | null {
  const separated = body.match(WRITE_WITH_SEPARATOR);
  if (separated) {
    const path = cleanPathToken(separated[2]);
    const content = unquote(separated[3]);
    if (path && content) {
      return { kind: "write-file", path, content, mode: separated[1].toLowerCase() === "append" ? "append" : "overwrite" };
    }
  }

  const toPath = body.match(WRITE_TO_PATH);
  if (toPath) {
    const path = cleanPathToken(toPath[3]);
    const content = unquote(toPath[2]);
    // Without a path shape this is more likely prose ("write a poem in english").
    if (path && content && hasPathShape(path)) {
      return { kind: "write-file", path, content, mode: toPath[1].toLowerCase() === "append" ? "append" : "overwrite" };
    }
  }

  return null;
}

function matchCreateDirectory(body: string): FileSystemIntent | null {
  const natural = body.match(CREATE_DIRECTORY);
  if (natural) {
    const path = cleanPathToken(natural[1]);
    if (path) return { kind: "create-directory", path };
  }

  // Multi-argument mkdir is left to the shell.
  const mkdir = body.match(MKDIR);
  if (mkdir && isSingleToken(mkdir[1])) {
    const path = cleanPathToken(mkdir[1]);
    if (path) return { kind: "create-directory", path };
  }

  return null;
}

function matchCreateFile(body: string): FileSystemIntent | null {
  const natural = body.match(CREATE_FILE);
  if (natural) {
    const path = cleanPathToken(natural[1]);
    if (path) return { kind: "create-file", path, content: natural[2] === undefined ? "" : unquote(natural[2]) };
  }

  const touch = body.match(TOUCH);
  if (touch && isSingleToken(touch[1])) {
    const path = cleanPathToken(touch[1]);
    if (path) return { kind: "create-file", path, content: "" };
  }

  return null;
}

function matchReadFile(body: string): FileSystemIntent | null {
  const natural = body.match(READ_FILE);
  if (natural) {
    const path = cleanPathToken(natural[1]);
    if (path) return { kind: "read-file", path };
  }

  // "show the contents of notes.txt": only a path-shaped target is a file.
  const contents = body.match(READ_CONTENTS);
  if (contents && isSingleToken(contents[1])) {
    const path = cleanPathToken(contents[1]);
    if (path && hasPathShape(path)) return { kind: "read-file", path };
  }

  const bare = body.match(READ_BARE);
  if (bare && isSingleToken(bare[1])) {
    const path = cleanPathToken(bare[1]);
    if (path && hasPathShape(path)) return { kind: "read-file", path };
  }

  return null;
}

function matchList(body: string): FileSystemIntent | null {
  const match = body.match(LIST_FILES) ?? body.match(LIST_DIRECTORY);
  if (match) {
    return { kind: "list-directory", path: listPath(match[1]) };
  }

  const bare = body.match(LIST_BARE);
  if (bare && (bare[1] === undefined || isSingleToken(bare[1]))) {
    return { kind: "list-directory", path: listPath(bare[1]) };
  }

  return null;
}

function listPath(raw: string | undefined): string {
  if (raw === undefined) return ".";
  return normalizeDirectoryPhrase(cleanPathToken(raw)) || ".";
}

function looksLikeShellCommand(trimmed: string): boolean {
  if (trimmed.includes("\n")) return false;
  const words = trimmed.toLowerCase().split(/\s+/);
  const first = words[0] === "sudo" ? words[1] ?? "" : words[0] ?? "";
  if (COMMAND_STARTERS.has(first)) return true;
  return AMBIGUOUS_STARTERS.has(first) && hasShellShape(words.slice(1));
}

function hasShellShape(args: string[]): boolean {
  return args.some((arg) => /^-{1,2}[a-z0-9]/.test(arg) || /^[|&><;]+$/.test(arg) || arg === "." || hasPathShape(arg));
}

/** One-line description of an intent, for logs and echoes. */
export function describeIntent(intent: CommandIntent): string {
  switch (intent.kind) {
    case "empty":
      return "nothing";
    case "help":
      return "show help";
    case "quit":
      return "quit";
    case "run-tests":
      return `run tests from ${intent.file ?? "the default task file"}`;
    case "recall":
      return `recall memory matching "${intent.query}"`;
    case "create-directory":
      return `create directory ${intent.path}`;
    case "create-file":
      return intent.content ? `create file ${intent.path} (${intent.content.length} chars)` : `create file ${intent.path}`;
    case "write-file":
      return `${intent.mode === "append" ? "append to" : "write"} file ${intent.path} (${intent.content.length} chars)`;
    case "list-directory":
      return `list directory ${intent.path}`;
    case "read-file":
      return `read file ${intent.path}`;
    case "run-command":
      return `run command: ${intent.command}`;
    case "chat":
      return `ask assistant: ${intent.prompt}`;
  }
}
