import type Database from "better-sqlite3";
import { StoreSetupError } from "./errors.js";

export interface SchemaStep {
  /** Reported in StoreSetupError when the statement fails. */
  name: string;
  sql: string;
}

export const MEMORY_SCHEMA_STEPS: readonly SchemaStep[] = [
  {
    name: "memory table",
    sql: `CREATE TABLE IF NOT EXISTS memory (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      content     TEXT NOT NULL,
      category    TEXT,
      importance  INTEGER DEFAULT 5,
      created_at  INTEGER
    )`,
  },
  {
    name: "memory_fts index",
    sql: `CREATE VIRTUAL TABLE IF NOT EXISTS memory_fts USING fts5(
      content,
      content='memory',
      content_rowid='id'
    )`,
  },
  {
    name: "memory_ai trigger",
    sql: `CREATE TRIGGER IF NOT EXISTS memory_ai AFTER INSERT ON memory BEGIN
      INSERT INTO memory_fts(rowid, content) VALUES (new.id, new.content);
    END`,
  },
  {
    name: "memory_ad trigger",
    sql: `CREATE TRIGGER IF NOT EXISTS memory_ad AFTER DELETE ON memory BEGIN
      INSERT INTO memory_fts(memory_fts, rowid, content) VALUES ('delete', old.id, old.content);
    END`,
  },
  {
    name: "memory category index",
    sql: "CREATE INDEX IF NOT EXISTS idx_memory_category ON memory(category, importance DESC, created_at DESC)",
  },
  {
    // Rows written before the triggers existed are only indexed by this step.
    name: "memory_fts rebuild",
    sql: "INSERT INTO memory_fts(memory_fts) VALUES ('rebuild')",
  },
];

/**
 * Bring the memory table and its FTS5 shadow index up to date.
 * Safe to re-run. Conversation tables belong to the external writer and are
 * never touched here.
 */
export function ensureSchema(db: Database.Database): void {
  for (const step of MEMORY_SCHEMA_STEPS) {
    try {
      db.exec(step.sql);
    } catch (err) {
      throw new StoreSetupError(step.name, err);
    }
  }
}
