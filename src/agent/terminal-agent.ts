// Terminal Agent: performs file, directory and shell operations for a TerminalIntent.
// Every operational failure comes back as an ErrorResult; perform() does not throw for them.
// Relative paths resolve against the configured working directory, never process.cwd().
import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname } from "node:path";
import type { AgentConfig } from "../types/config.js";
import type { TerminalIntent, WriteMode } from "../types/intent.js";
import type { OperationResult } from "../types/result.js";
import { resolveAgainst } from "../shared/paths.js";
import { truncateUtf8 } from "../shared/text.js";
import { ShellExecutor, type Executor, type ExecResult } from "../execution/executor.js";
import { categorizeCommandFailure, describeFsError, failure, isErrnoException, success } from "./results.js";
import { logger } from "../logger.js";

export interface TerminalAgentOptions {
  workingDirectory: string;
  commandTimeoutMs: number;
  maxOutputBytes: number;
  maxReadBytes: number;
  executor?: Executor;
}

export class TerminalAgent {
  readonly workingDirectory: string;
  private readonly commandTimeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly maxReadBytes: number;
  private readonly executor: Executor;

  constructor(options: TerminalAgentOptions) {
    this.workingDirectory = options.workingDirectory;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.maxOutputBytes = options.maxOutputBytes;
    this.maxReadBytes = options.maxReadBytes;
    this.executor = options.executor ?? new ShellExecutor();
  }

  static fromConfig(config: AgentConfig, executor?: Executor): TerminalAgent {
    return new TerminalAgent({
      workingDirectory: config.working_directory,
      commandTimeoutMs: config.execution.command_timeout_seconds * 1000,
      maxOutputBytes: config.execution.max_output_bytes,
      maxReadBytes: config.files.max_read_bytes,
      executor,
    });
  }

  async perform(intent: TerminalIntent): Promise<OperationResult> {
    switch (intent.kind) {
      case "create-directory":
        return this.createDirectory(intent.path);
      case "create-file":
        return this.createFile(intent.path, intent.content);
      case "write-file":
        return this.writeFile(intent.path, intent.content, intent.mode);
      case "list-directory":
        return this.listDirectory(intent.path);
      case "read-file":
        return this.readFile(intent.path);
      case "run-command":
        return this.runCommand(intent.command);
    }
  }

  resolvePath(pathInput: string): string {
    return resolveAgainst(this.workingDirectory, pathInput);
  }

  async createDirectory(pathInput: string): Promise<OperationResult> {
    const start = performance.now();
    const invalid = this.rejectEmptyPath("create-directory", start, pathInput);
    if (invalid) return invalid;
    const absolutePath = this.resolvePath(pathInput);

    try {
      const existing = await statOrNull(absolutePath);
      if (existing?.isDirectory()) {
        return success("create-directory", start, `Directory already exists: ${absolutePath}`, { path: absolutePath });
      }
      if (existing) {
        return failure("create-directory", start, {
          code: "PATH_CONFLICT", category: "conflict", path: absolutePath,
          message: `A file already exists at ${absolutePath}`,
          remediation: ["Choose a different directory name", "Remove or rename the existing file first"],
        });
      }
      await fs.mkdir(absolutePath, { recursive: true });
      logger.info({ path: absolutePath }, "Directory created");
      return success("create-directory", start, `Directory created: ${absolutePath}`, { path: absolutePath });
    } catch (err) {
      return failure("create-directory", start, describeFsError(err, absolutePath));
    }
  }

  async createFile(pathInput: string, content = ""): Promise<OperationResult> {
    const start = performance.now();
    const invalid = this.rejectEmptyPath("create-file", start, pathInput);
    if (invalid) return invalid;
    const absolutePath = this.resolvePath(pathInput);

    try {
      await fs.mkdir(dirname(absolutePath), { recursive: true });
      // "wx" fails with EEXIST instead of truncating an existing file.
      await fs.writeFile(absolutePath, content, { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        return failure("create-file", start, {
          code: "FILE_EXISTS", category: "conflict", path: absolutePath,
          message: `File already exists: ${absolutePath}`,
          remediation: [`Use "write <content> to ${pathInput}" to replace it`, `Use "append <content> to ${pathInput}" to add to it`],
        });
      }
      return failure("create-file", start, describeFsError(err, absolutePath));
    }

    logger.info({ path: absolutePath, bytes: Buffer.byteLength(content) }, "File created");
    const message = content
      ? `File created with ${Buffer.byteLength(content)} bytes: ${absolutePath}`
      : `File created: ${absolutePath}`;
    return success("create-file", start, message, { path: absolutePath });
  }

  async writeFile(pathInput: string, content: string, mode: WriteMode): Promise<OperationResult> {
    const start = performance.now();
    const invalid = this.rejectEmptyPath("write-file", start, pathInput);
    if (invalid) return invalid;
    const absolutePath = this.resolvePath(pathInput);

    try {
      await fs.mkdir(dirname(absolutePath), { recursive: true });
      if (mode === "append") {
        await fs.appendFile(absolutePath, content, "utf-8");
      } else {
        await fs.writeFile(absolutePath, content, "utf-8");
      }
    } catch (err) {
      return failure("write-file", start, describeFsError(err, absolutePath));
    }

    logger.info({ path: absolutePath, mode }, "File written");
    const message = mode === "append" ? `Content appended: ${absolutePath}` : `File written: ${absolutePath}`;
    return success("write-file", start, message, { path: absolutePath });
  }

  async listDirectory(pathInput: string): Promise<OperationResult> {
    const start = performance.now();
    const absolutePath = this.resolvePath(pathInput || ".");

    try {
      const entries = await fs.readdir(absolutePath, { withFileTypes: true });
      const names = entries
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name));
      if (names.length === 0) {
        return success("list-directory", start, `Directory is empty: ${absolutePath}`, { path: absolutePath });
      }
      const noun = names.length === 1 ? "entry" : "entries";
      return success("list-directory", start, `${names.length} ${noun} in ${absolutePath}`, {
        path: absolutePath,
        output: names.join("\n"),
      });
    } catch (err) {
      return failure("list-directory", start, describeFsError(err, absolutePath));
    }
  }

  async readFile(pathInput: string): Promise<OperationResult> {
    const start = performance.now();
    const invalid = this.rejectEmptyPath("read-file", start, pathInput);
    if (invalid) return invalid;
    const absolutePath = this.resolvePath(pathInput);

    try {
      const handle = await fs.open(absolutePath, "r");
      try {
        const stats = await handle.stat();
        if (stats.isDirectory()) {
          return failure("read-file", start, {
            code: "IS_A_DIRECTORY", category: "invalid_input", path: absolutePath,
            message: `Is a directory: ${absolutePath}`,
            remediation: [`Use "list files in ${pathInput}" to see its contents`],
          });
        }
        // One byte past the limit shows whether the cut lands inside a character.
        const length = Math.min(stats.size, this.maxReadBytes + 1);
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, 0);
        const { text, bytes } = truncateUtf8(buffer.subarray(0, bytesRead), this.maxReadBytes);
        return success("read-file", start, `Read ${bytes} bytes from ${absolutePath}`, {
          path: absolutePath,
          output: text,
          truncated: stats.size > this.maxReadBytes,
        });
      } finally {
        await handle.close();
      }
    } catch (err) {
      return failure("read-file", start, describeFsError(err, absolutePath));
    }
  }

  async runCommand(command: string): Promise<OperationResult> {
    const start = performance.now();
    if (!command.trim()) {
      return failure("run-command", start, {
        code: "COMMAND_FAILED", category: "invalid_input", message: "No command given",
        remediation: ['Type the command after "run command", e.g. "run command ls -la"'],
      });
    }

    let result: ExecResult;
    try {
      result = await this.executor.execute(command, {
        cwd: this.workingDirectory,
        timeoutMs: this.commandTimeoutMs,
        maxBufferBytes: this.maxOutputBytes,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ command, error: message }, "Command could not be started");
      return failure("run-command", start, {
        code: "COMMAND_FAILED", category: "command_failed",
        message: `An unexpected error occurred: ${message}`,
        remediation: ["Check that the working directory exists", "Check that a system shell is available"],
      });
    }

    if (result.timedOut) {
      logger.warn({ command, timeoutMs: this.commandTimeoutMs }, "Command timed out");
      return failure("run-command", start, {
        code: "COMMAND_TIMEOUT", category: "timeout",
        message: `Command timed out after ${this.commandTimeoutMs / 1000}s: ${command}`,
        output: result.output || undefined,
        remediation: ["Raise execution.command_timeout_seconds in the config", "Run long-lived processes outside the agent"],
      });
    }

    if (result.truncated) {
      logger.warn({ command, maxOutputBytes: this.maxOutputBytes }, "Command output truncated");
      return success("run-command", start, `Command output exceeded ${this.maxOutputBytes} bytes and was truncated`, {
        output: result.output,
        truncated: true,
      });
    }

    if (result.exitCode === 0) {
      return result.output
        ? success("run-command", start, "Command executed", { output: result.output })
        : success("run-command", start, "Command executed successfully with no output.");
    }

    logger.error({ command, exitCode: result.exitCode }, "Command execution failed");
    return failure("run-command", start, categorizeCommandFailure(result.output, result.exitCode));
  }

  private rejectEmptyPath(operation: TerminalIntent["kind"], start: number, pathInput: string): OperationResult | null {
    if (pathInput.trim()) return null;
    return failure(operation, start, {
      code: "INVALID_PATH", category: "invalid_input", message: "Path is empty",
      remediation: ["Name the file or directory to act on"],
    });
  }
}

async function statOrNull(absolutePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(absolutePath);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}
