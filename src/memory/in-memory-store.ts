import type { MemoryStore, TaskRecord } from "./types.js";

/** Used when memory.enabled is false: ids still count up, nothing outlives the process. */
export class InMemoryStore implements MemoryStore {
  private readonly records: TaskRecord[] = [];
  private readonly defaultLimit: number;

  constructor(defaultLimit = 5) {
    this.defaultLimit = defaultLimit;
  }

  save(agent: string, userInput: string, response: string): number {
    const id = this.records.length + 1;
    this.records.push({ id, agent, userInput, response, timestamp: sqliteTimestamp(new Date()) });
    return id;
  }

  findRelevant(text: string, limit = this.defaultLimit): TaskRecord[] {
    const needle = text.toLowerCase();
    return this.records
      .filter((record) => record.userInput.toLowerCase().includes(needle))
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.id - a.id)
      .slice(0, limit);
  }

  close(): void {
    this.records.length = 0;
  }
}

function sqliteTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
