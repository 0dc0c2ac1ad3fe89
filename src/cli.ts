#!/usr/bin/env node
import { resolve } from "node:path";
import chalk from "chalk";
import { createProgram, type CliOptions } from "./cli/program.js";
import { loadConfig } from "./config/loader.js";
import { createApp, type App } from "./app.js";
import { startRepl } from "./session/repl.js";
import { expandHome } from "./shared/paths.js";
import { AgentError } from "./shared/errors.js";
import { logger } from "./logger.js";

function bootstrap(options: CliOptions): App {
  const { config, configPath, firstRun } = loadConfig(options.config);
  if (firstRun) {
    process.stdout.write(`${chalk.dim(`Wrote default config to ${configPath}`)}\n`);
  }
  const effective = options.workingDir
    ? { ...config, working_directory: resolve(expandHome(options.workingDir)) }
    : config;
  return createApp(effective);
}

const program = createProgram({
  async repl(options) {
    const app = bootstrap(options);
    process.stdout.write(`${chalk.bold.cyan("=== Intelligent Programming Assistant ===")}\n`);
    process.stdout.write(
      `${chalk.dim(`Working directory: ${app.config.working_directory}`)}\n` +
        `${chalk.dim('Type "help" for commands, "quit" to exit.')}\n`,
    );
    if (!app.chat.configured) {
      process.stdout.write(`${chalk.yellow("No LLM endpoint configured: only file and shell commands are available.")}\n`);
    }
    await startRepl(app.session, { prompt: chalk.green(">> ") });
  },

  async exec(task, options) {
    const app = bootstrap(options);
    try {
      const outcome = await app.runner.execute(task);
      if (outcome.result.status === "error") process.exitCode = 1;
    } finally {
      app.memory.close();
    }
  },

  async test(file, options) {
    const app = bootstrap(options);
    const queued = await app.session.queueTaskFile(file);
    await app.session.close();
    if (queued < 0) process.exitCode = 1;
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof AgentError) {
    process.stderr.write(`${chalk.red(`Error: ${err.message}`)}\n`);
  } else {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, "Fatal error");
  }
  process.exit(1);
});
