// Command execution layer: every shell command the agent runs passes through here.
// ShellExecutor is the hard boundary between agent code and the OS; changing
// shell, timeout or buffer behavior here affects every run-command task.
import execa from "execa";
import { truncateUtf8 } from "../shared/text.js";
import { logger } from "../logger.js";

/** Result of command execution. stdout and stderr are interleaved in `output`. */
export interface ExecResult {
  readonly output: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly timedOut: boolean;
  /** Output went over `maxBufferBytes`; `output` holds what fits. */
  readonly truncated: boolean;
}

export interface ExecOptions {
  readonly cwd: string;
  readonly timeoutMs: number;
  readonly maxBufferBytes: number;
}

export interface Executor {
  execute(command: string, options: ExecOptions): Promise<ExecResult>;
}

/**
 * Runs a command line through the system shell.
 * Throws when the shell cannot be started at all (missing cwd, no shell).
 */
export class ShellExecutor implements Executor {
  async execute(command: string, options: ExecOptions): Promise<ExecResult> {
    const start = performance.now();
    const result = await execa(command, {
      shell: true,
      cwd: options.cwd,
      timeout: options.timeoutMs,
      maxBuffer: options.maxBufferBytes,
      all: true,
      reject: false,
      stdin: "ignore",
    });
    const durationMs = Math.round(performance.now() - start);
    const stdout = result.stdout ?? "";
    const stderr = result.stderr ?? "";
    const all = result.all ?? stdout;
    const max = options.maxBufferBytes;
    // execa stops reading at maxBuffer (all gets twice that) and leaves exitCode unset.
    const overflowed =
      !result.timedOut &&
      (Buffer.byteLength(stdout) > max || Buffer.byteLength(stderr) > max || Buffer.byteLength(all) > max * 2);

    if (result.failed && !result.timedOut && !overflowed && typeof result.exitCode !== "number" && !result.signal) {
      const message = startFailureMessage(result, command);
      logger.debug({ command, cwd: options.cwd, error: message }, "Command could not start");
      throw new Error(message);
    }

    // exitCode is undefined when the process was killed (timeout, signal).
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : 1;
    logger.debug({ command, exitCode, durationMs, timedOut: result.timedOut, truncated: overflowed }, "Command finished");
    return {
      output: (overflowed ? truncateUtf8(Buffer.from(longest(all, stdout)), max).text : all).trim(),
      exitCode,
      durationMs,
      timedOut: result.timedOut,
      truncated: overflowed,
    };
  }
}

// The merged stream can lag behind stdout when the cap stops reading.
function longest(a: string, b: string): string {
  return Buffer.byteLength(b) > Buffer.byteLength(a) ? b : a;
}

/** With `reject: false` a spawn error comes back as the result; its own message is `originalMessage`. */
function startFailureMessage(result: object, command: string): string {
  if ("originalMessage" in result && typeof result.originalMessage === "string" && result.originalMessage) {
    return result.originalMessage;
  }
  return `Could not start command: ${command}`;
}
