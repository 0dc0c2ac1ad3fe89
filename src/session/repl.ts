import { createInterface } from "node:readline";
import type { AssistantSession } from "./session.js";

export interface ReplOptions {
  prompt?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Read lines until "quit" or end of input, then drain the queue and close the session. */
export async function startRepl(session: AssistantSession, options: ReplOptions = {}): Promise<void> {
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    prompt: options.prompt ?? ">> ",
  });

  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  rl.prompt();
  try {
    for await (const line of rl) {
      if ((await session.handleInput(line)) === "quit") break;
      rl.prompt();
    }
  } finally {
    // Leaving the loop early already closes the interface.
    if (!closed) rl.close();
    await session.close();
  }
}
