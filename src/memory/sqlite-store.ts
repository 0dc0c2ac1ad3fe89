// SQLite-backed task memory. One table, created on open; rows are never updated.
import Database from "better-sqlite3";
import { dirname } from "node:path";
import { mkdirSync } from "node:fs";
import type { MemoryStore, TaskRecord } from "./types.js";
import { AgentError, AgentErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

interface MemoryRow {
  id: number;
  agent: string;
  user_input: string;
  ai_response: string;
  timestamp: string;
}

export class SqliteMemoryStore implements MemoryStore {
  private readonly db: Database.Database;
  private readonly defaultLimit: number;

  /** `databasePath` may be ":memory:". */
  constructor(databasePath: string, defaultLimit = 5) {
    this.defaultLimit = defaultLimit;
    try {
      if (databasePath !== ":memory:") mkdirSync(dirname(databasePath), { recursive: true });
      this.db = new Database(databasePath);
    } catch (err) {
      throw new AgentError(AgentErrorCode.MEMORY_UNAVAILABLE, `Could not open memory database at ${databasePath}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    this.db.exec(`CREATE TABLE IF NOT EXISTS memory (
      id INTEGER PRIMARY KEY,
      agent TEXT,
      user_input TEXT,
      ai_response TEXT,
      timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
    )`);
    logger.info({ databasePath }, "Memory database ready");
  }

  save(agent: string, userInput: string, response: string): number {
    const info = this.db
      .prepare("INSERT INTO memory (agent, user_input, ai_response) VALUES (?, ?, ?)")
      .run(agent, userInput, response);
    return Number(info.lastInsertRowid);
  }

  findRelevant(text: string, limit = this.defaultLimit): TaskRecord[] {
    const pattern = `%${text.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
    const rows = this.db
      .prepare<[string, number], MemoryRow>(
        `SELECT id, agent, user_input, ai_response, timestamp FROM memory
         WHERE user_input LIKE ? ESCAPE '\\'
         ORDER BY timestamp DESC, id DESC
         LIMIT ?`,
      )
      .all(pattern, limit);
    return rows.map((row) => ({
      id: row.id,
      agent: row.agent,
      userInput: row.user_input,
      response: row.ai_response,
      timestamp: row.timestamp,
    }));
  }

  close(): void {
    this.db.close();
  }
}
