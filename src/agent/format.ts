import type { OperationResult } from "../types/result.js";

/** Render a result the way the REPL and the result files show it. */
export function formatResult(result: OperationResult): string {
  const lines: string[] = [];
  if (result.status === "success") {
    lines.push(result.message);
    if (result.output) lines.push(result.output);
    if (result.truncated) lines.push("… (truncated)");
  } else {
    lines.push(`Error: ${result.message}`);
    if (result.output) lines.push(result.output);
    for (const hint of result.remediation) lines.push(`  - ${hint}`);
  }
  return lines.join("\n");
}
