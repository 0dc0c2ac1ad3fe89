import pino from "pino";

// Logs go to stderr so the REPL's stdout carries only task output.
export const logger = pino(
  {
    name: "terminal-agent",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
