// Interactive session: answers built-ins on the spot and queues everything else
// for the TaskRunner, one task at a time in input order.
import { resolve } from "node:path";
import type { MemoryStore } from "../memory/types.js";
import type { TaskRunner, Write } from "../tasks/task-runner.js";
import { TaskQueue } from "../tasks/task-queue.js";
import { loadTaskFile } from "../tasks/task-file.js";
import { interpret } from "../interpreter/interpreter.js";
import { isBuiltinIntent } from "../types/intent.js";
import { AgentError, AgentErrorCode } from "../shared/errors.js";
import { HELP_TEXT } from "./help.js";
import { logger } from "../logger.js";

export type SessionState = "continue" | "quit";

export interface AssistantSessionOptions {
  runner: TaskRunner;
  memory: MemoryStore;
  defaultTaskFile: string;
  write: Write;
  /** Base for relative task file paths. */
  cwd?: string;
}

export class AssistantSession {
  private readonly memory: MemoryStore;
  private readonly defaultTaskFile: string;
  private readonly write: Write;
  private readonly cwd: string;
  private readonly queue: TaskQueue<string>;
  private closed = false;

  constructor(options: AssistantSessionOptions) {
    this.memory = options.memory;
    this.defaultTaskFile = options.defaultTaskFile;
    this.write = options.write;
    this.cwd = options.cwd ?? process.cwd();
    const runner = options.runner;
    this.queue = new TaskQueue(async (task) => {
      await runner.execute(task);
    });
  }

  get pendingTasks(): number {
    return this.queue.size;
  }

  async handleInput(line: string): Promise<SessionState> {
    const intent = interpret(line);
    switch (intent.kind) {
      case "empty":
        return "continue";
      case "quit":
        return "quit";
      case "help":
        this.write(HELP_TEXT);
        return "continue";
      case "run-tests":
        await this.queueTaskFile(intent.file);
        return "continue";
      case "recall":
        this.showRecall(intent.query);
        return "continue";
      default:
        this.queue.enqueue(line.trim());
        return "continue";
    }
  }

  /** Queue every task in a task file; returns how many were queued, or -1 when the file is missing. */
  async queueTaskFile(file: string | null): Promise<number> {
    const filePath = resolve(this.cwd, file ?? this.defaultTaskFile);
    let lines: string[];
    try {
      lines = await loadTaskFile(filePath);
    } catch (err) {
      if (err instanceof AgentError && err.code === AgentErrorCode.TASK_FILE_NOT_FOUND) {
        this.write(`Error: ${err.message}\n`);
        return -1;
      }
      throw err;
    }

    // Session commands inside a task file would stop or recurse the run.
    const tasks = lines.filter((line) => !isBuiltinIntent(interpret(line)));
    const skipped = lines.length - tasks.length;
    if (skipped > 0) logger.warn({ filePath, skipped }, "Skipped session commands in task file");

    for (const task of tasks) this.queue.enqueue(task);
    this.write(`Queued ${tasks.length} ${tasks.length === 1 ? "task" : "tasks"} from ${filePath}\n`);
    return tasks.length;
  }

  /** Resolves once every queued task has finished. */
  waitForIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.queue.onIdle();
    this.memory.close();
  }

  private showRecall(query: string): void {
    const records = this.memory.findRelevant(query);
    if (records.length === 0) {
      this.write(`No remembered tasks match "${query}".\n`);
      return;
    }
    const lines = records.map((record) => {
      const firstLine = record.response.split("\n", 1)[0];
      return `#${record.id} [${record.timestamp}] ${record.agent}: ${record.userInput}\n    ${firstLine}`;
    });
    this.write(`${lines.join("\n")}\n`);
  }
}
