import { z } from "zod";

/** Full agent configuration. Add new fields here and in DEFAULT_CONFIG. */
export const AgentConfigSchema = z.object({
  working_directory: z.string().min(1),
  llm: z.object({
    base_url: z.string().url().nullable(),
    model: z.string().min(1),
    api_key: z.string().nullable(),
    system_prompt: z.string(),
    max_history_chars: z.number().int().positive(),
    timeout_seconds: z.number().positive(),
  }),
  execution: z.object({
    command_timeout_seconds: z.number().positive(),
    max_output_bytes: z.number().int().positive(),
  }),
  files: z.object({
    max_read_bytes: z.number().int().positive(),
  }),
  memory: z.object({
    enabled: z.boolean(),
    database: z.string().min(1),
    recall_limit: z.number().int().positive(),
  }),
  results: z.object({
    save_task_results: z.boolean(),
    directory: z.string().min(1),
  }),
  tests: z.object({
    task_file: z.string().min(1),
  }),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
