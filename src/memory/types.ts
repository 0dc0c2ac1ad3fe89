/** One delegated task as stored in memory. */
export interface TaskRecord {
  id: number;
  agent: string;
  userInput: string;
  response: string;
  /** SQLite CURRENT_TIMESTAMP format, UTC: "YYYY-MM-DD HH:MM:SS". */
  timestamp: string;
}

export interface MemoryStore {
  /** Store a task and return its id. */
  save(agent: string, userInput: string, response: string): number;
  /** Tasks whose input contains `text` (case-insensitive), newest first. */
  findRelevant(text: string, limit?: number): TaskRecord[];
  close(): void;
}
