import fs from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../logger.js";

export interface ResultRecorderOptions {
  directory: string;
  enabled: boolean;
  now?: () => Date;
}

/** Writes one test_result_<timestamp>_<taskId>.txt file per finished task. */
export class ResultRecorder {
  private readonly directory: string;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  constructor(options: ResultRecorderOptions) {
    this.directory = options.directory;
    this.enabled = options.enabled;
    this.now = options.now ?? (() => new Date());
  }

  /** Returns the written file path, or null when recording is disabled. */
  async save(task: string, taskId: number, formattedResult: string): Promise<string | null> {
    if (!this.enabled) return null;
    const filePath = join(this.directory, `test_result_${fileTimestamp(this.now())}_${taskId}.txt`);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(filePath, `Task: ${task}\nResult:\n${formattedResult}\n`, "utf-8");
    logger.debug({ filePath, taskId }, "Task result saved");
    return filePath;
  }
}

/** Local time as YYYY-MM-DD_HH-MM-SS. */
export function fileTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}
