import { isAbsolute, join } from "node:path";
import type { AgentConfig } from "../types/config.js";
import type { MemoryStore } from "./types.js";
import { SqliteMemoryStore } from "./sqlite-store.js";
import { InMemoryStore } from "./in-memory-store.js";

export type { MemoryStore, TaskRecord } from "./types.js";
export { SqliteMemoryStore } from "./sqlite-store.js";
export { InMemoryStore } from "./in-memory-store.js";

/** Open the store named by the config; relative database paths live in the working directory. */
export function openMemoryStore(config: AgentConfig): MemoryStore {
  if (!config.memory.enabled) return new InMemoryStore(config.memory.recall_limit);
  const database = config.memory.database;
  const databasePath = database === ":memory:" || isAbsolute(database) ? database : join(config.working_directory, database);
  return new SqliteMemoryStore(databasePath, config.memory.recall_limit);
}
