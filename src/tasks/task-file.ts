import fs from "node:fs/promises";
import { AgentError, AgentErrorCode } from "../shared/errors.js";
import { isErrnoException } from "../agent/results.js";

/** Read a task file: one task per line; blank lines and `#` comments are skipped. */
export async function loadTaskFile(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new AgentError(AgentErrorCode.TASK_FILE_NOT_FOUND, `Task file not found: ${filePath}`, { filePath });
    }
    throw err;
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
