import type { Supervisor, DelegationOutcome } from "../supervisor/supervisor.js";
import type { ResultRecorder } from "./result-recorder.js";
import { formatResult } from "../agent/format.js";
import { logger } from "../logger.js";

export type Write = (text: string) => void;

export interface TaskRunnerDeps {
  supervisor: Supervisor;
  recorder: ResultRecorder;
  write: Write;
}

/** Runs one task end to end: delegate, record the result file, print the result block. */
export class TaskRunner {
  private readonly supervisor: Supervisor;
  private readonly recorder: ResultRecorder;
  private readonly write: Write;

  constructor(deps: TaskRunnerDeps) {
    this.supervisor = deps.supervisor;
    this.recorder = deps.recorder;
    this.write = deps.write;
  }

  async execute(task: string): Promise<DelegationOutcome> {
    const outcome = await this.supervisor.delegate(task);
    const formatted = formatResult(outcome.result);

    try {
      await this.recorder.save(task, outcome.taskId, formatted);
    } catch (err) {
      // The task itself succeeded or failed already; a missing result file must not hide it.
      logger.warn({ taskId: outcome.taskId, error: err instanceof Error ? err.message : String(err) }, "Could not save task result");
    }

    this.write(`\nTask: ${task}\nResult:\n${formatted}\nTask ID: ${outcome.taskId}\n\n`);
    return outcome;
  }
}
