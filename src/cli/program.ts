import { Command } from "commander";

export const VERSION = "0.1.0";

export interface CliOptions {
  config?: string;
  workingDir?: string;
}

/** What each command line form does; the binary wires these to the app. */
export interface CliActions {
  repl(options: CliOptions): Promise<void>;
  exec(task: string, options: CliOptions): Promise<void>;
  test(file: string | null, options: CliOptions): Promise<void>;
}

export function createProgram(actions: CliActions): Command {
  const program = new Command();

  // Global options go before the subcommand, so task words such as "-la" reach exec untouched.
  program
    .name("terminal-agent")
    .description("Natural-language terminal assistant: files, shell commands and an optional LLM")
    .version(VERSION)
    .enablePositionalOptions()
    .option("-c, --config <path>", "config file (default: ~/.config/terminal-agent/config.yaml)")
    .option("-w, --working-dir <dir>", "directory that relative paths and commands run in")
    .action(async () => {
      await actions.repl(program.opts<CliOptions>());
    });

  program
    .command("exec")
    .description("run a single task and exit")
    .argument("<words...>", "the task, e.g. create file notes.txt")
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (words: string[]) => {
      await actions.exec(words.join(" "), program.opts<CliOptions>());
    });

  program
    .command("test")
    .description("run every task in a task file and exit")
    .argument("[file]", "task file (default: tests.task_file from the config)")
    .action(async (file: string | undefined) => {
      await actions.test(file ?? null, program.opts<CliOptions>());
    });

  return program;
}
