// Config loader: reads ~/.config/terminal-agent/config.yaml and deep-merges it over defaults.
// On first run (no config file) the default YAML is written and firstRun is reported.
// Environment overrides are applied after the merge, then the result is validated with zod.
// Config shape lives in src/types/config.ts; add new fields there and in DEFAULT_CONFIG.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { AgentConfigSchema, type AgentConfig } from "../types/config.js";
import { AgentError, AgentErrorCode } from "../shared/errors.js";
import { expandHome } from "../shared/paths.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "terminal-agent");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: AgentConfig = {
  working_directory: "~/terminal-agent",
  llm: {
    base_url: null,
    model: "default-model",
    api_key: null,
    system_prompt: "You are a versatile agent capable of executing various tasks.",
    max_history_chars: 2000,
    timeout_seconds: 60,
  },
  execution: { command_timeout_seconds: 30, max_output_bytes: 1024 * 1024 },
  files: { max_read_bytes: 64 * 1024 },
  memory: { enabled: true, database: "agent_memory.db", recall_limit: 5 },
  results: { save_task_results: true, directory: "." },
  tests: { task_file: "test_tasks.txt" },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# Terminal Agent configuration
# Generated automatically on first run. All values shown are defaults.

# Base for relative paths, shell commands, the memory database and result files.
working_directory: ~/terminal-agent

llm:
  # OpenAI-compatible endpoint, e.g. http://localhost:1234/v1 (null disables chat)
  base_url: null
  model: default-model
  api_key: null
  system_prompt: "You are a versatile agent capable of executing various tasks."
  max_history_chars: 2000
  timeout_seconds: 60

execution:
  command_timeout_seconds: 30
  max_output_bytes: 1048576

files:
  max_read_bytes: 65536

memory:
  enabled: true
  database: agent_memory.db
  recall_limit: 5

results:
  save_task_results: true
  directory: "."

tests:
  task_file: test_tasks.txt
`;

export interface ConfigResult {
  config: AgentConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env.TERMINAL_AGENT_CONFIG ?? DEFAULT_CONFIG_PATH;
  let overrides: Record<string, unknown> = {};
  let firstRun = false;

  if (!existsSync(configPath)) {
    firstRun = true;
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
  } else {
    try {
      const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
      if (isRecord(parsed)) {
        overrides = parsed;
      } else if (parsed !== null && parsed !== undefined) {
        logger.warn({ configPath }, "Config file is not a mapping, using defaults");
      }
    } catch (err) {
      logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    }
  }

  const merged = applyEnvOverrides(deepMerge(DEFAULT_CONFIG, overrides), env);
  const validated = AgentConfigSchema.safeParse(merged);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new AgentError(AgentErrorCode.CONFIG_INVALID, `Invalid configuration in ${configPath}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }

  const config: AgentConfig = {
    ...validated.data,
    working_directory: resolve(expandHome(validated.data.working_directory)),
  };
  return { config, configPath, firstRun };
}

/**
 * Environment variables win over the file. TERMINAL_AGENT_WORKING_DIR beats WORKING_DIRECTORY,
 * and LLM_BASE_URL beats LOCAL_API_ENDPOINT.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = { ...config };

  const workingDirectory = env.TERMINAL_AGENT_WORKING_DIR || env.WORKING_DIRECTORY;
  if (workingDirectory) result.working_directory = workingDirectory;

  const llm: Record<string, unknown> = {};
  const baseUrl = env.LLM_BASE_URL || (env.LOCAL_API_ENDPOINT ? normalizeEndpoint(env.LOCAL_API_ENDPOINT) : undefined);
  if (baseUrl) llm.base_url = baseUrl;
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;
  if (env.LLM_API_KEY) llm.api_key = env.LLM_API_KEY;
  if (Object.keys(llm).length > 0) {
    result.llm = deepMerge(isRecord(result.llm) ? result.llm : {}, llm);
  }

  return result;
}

/** Accept a full chat-completions URL and reduce it to the API base the SDK expects. */
export function normalizeEndpoint(endpoint: string): string {
  return endpoint.trim().replace(/\/+$/, "").replace(/\/chat\/completions$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
