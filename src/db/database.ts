import type Database from "better-sqlite3";
import { StoreHandle } from "./store.js";
import { StoreSetupError, errorMessage } from "./errors.js";
import {
  CONTENT_PREVIEW_LEN,
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
  SEARCH_RESULT_LIMIT,
  TITLE_SEARCH_LIMIT,
} from "../types/conversation.js";
import type {
  Conversation,
  ConversationSummary,
  ListConversationsInput,
  Message,
  SearchResult,
} from "../types/conversation.js";
import { DEFAULT_IMPORTANCE } from "../types/memory.js";
import type {
  DeleteMemoryResult,
  MemoryEntry,
  StoreMemoryInput,
  StoreMemoryResult,
} from "../types/memory.js";
import type { Lookup } from "../types/result.js";

export const MEMORY_SEARCH_LIMIT = 10;
export const CATEGORY_SEARCH_LIMIT = 50;

type ConversationRow = Omit<Conversation, "messages">;

const MESSAGE_COLUMNS = `
  id, conversation_id, role, content, created_at,
  tool_calls, tool_call_id, tool_name, tool_status,
  tool_params_json, tool_result_json, reasoning_content`;

const SUMMARY_SELECT = `
  SELECT c.id, c.title, c.created_at, c.title_generated, c.profile_name,
         COUNT(m.id) AS message_count
  FROM conversations c
  LEFT JOIN messages m ON c.id = m.conversation_id`;

const SUMMARY_GROUP = "GROUP BY c.id, c.title, c.created_at, c.title_generated, c.profile_name";

/**
 * Build an FTS5 MATCH expression from a keyword list.
 * Keywords are trimmed, blanks dropped, each one double-quoted (inner quotes
 * doubled) and the lot joined with OR. Returns null when nothing is left.
 */
export function buildKeywordQuery(keywords: readonly string[]): string | null {
  const terms = keywords.map((k) => k.trim()).filter(Boolean);
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t.replace(/"/g, '""')}"`).join(" OR ");
}

/** Escape LIKE wildcards so the query matches as a literal substring. */
export function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(Math.trunc(value), min), max);
}

/**
 * Every read and write over conversations and memory notes.
 *
 * Each method is one unit of work through the StoreHandle. Statement failures
 * are logged and turned into an empty list, an `error` lookup or a
 * `success: false` result; only StoreSetupError escapes, since a store that
 * cannot be initialized is fatal to the call that tried.
 */
export class RecallDatabase {
  constructor(readonly store: StoreHandle) {}

  async searchConversations(keywords: readonly string[]): Promise<SearchResult[]> {
    const ftsQuery = buildKeywordQuery(keywords);
    if (!ftsQuery) return [];

    return this.readList("search_conversations", (db) =>
      db.prepare(
        `SELECT DISTINCT
           m.conversation_id,
           m.id AS message_id,
           m.role,
           substr(m.content, 1, ${CONTENT_PREVIEW_LEN}) AS content_preview,
           m.created_at
         FROM messages m
         JOIN messages_fts ON m.id = messages_fts.rowid
         WHERE messages_fts MATCH ?
         ORDER BY m.created_at DESC, message_id DESC
         LIMIT ${SEARCH_RESULT_LIMIT}`
      ).all(ftsQuery) as SearchResult[]
    );
  }

  async getConversation(conversationId: string): Promise<Lookup<Conversation>> {
    return this.lookup("get_conversation", (db) => {
      const row = db.prepare(
        "SELECT id, title, created_at, title_generated, profile_name FROM conversations WHERE id = ?"
      ).get(conversationId) as ConversationRow | undefined;
      if (!row) return null;

      const messages = db.prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE conversation_id = ?
         ORDER BY created_at ASC, id ASC`
      ).all(conversationId) as Message[];
      return { ...row, messages };
    });
  }

  async searchConversationTitles(query: string): Promise<ConversationSummary[]> {
    return this.readList("search_conversation_titles", (db) =>
      db.prepare(
        `${SUMMARY_SELECT}
         WHERE c.title LIKE ? ESCAPE '\\'
         ${SUMMARY_GROUP}
         ORDER BY c.created_at DESC
         LIMIT ${TITLE_SEARCH_LIMIT}`
      ).all(likePattern(query)) as ConversationSummary[]
    );
  }

  async listConversations(input: ListConversationsInput = {}): Promise<ConversationSummary[]> {
    const limit = clamp(input.limit ?? DEFAULT_LIST_LIMIT, 0, MAX_LIST_LIMIT);
    const offset = clamp(input.offset ?? 0, 0, Number.MAX_SAFE_INTEGER);
    if (limit === 0) return [];

    return this.readList("list_conversations", (db) =>
      db.prepare(
        `${SUMMARY_SELECT}
         ${SUMMARY_GROUP}
         ORDER BY c.created_at DESC
         LIMIT ? OFFSET ?`
      ).all(limit, offset) as ConversationSummary[]
    );
  }

  async getMessage(messageId: number): Promise<Lookup<Message>> {
    return this.lookup("get_message", (db) =>
      (db.prepare(`SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = ?`).get(messageId) as Message | undefined) ?? null
    );
  }

  async storeMemory(input: StoreMemoryInput): Promise<StoreMemoryResult> {
    const { content } = input;
    if (!content.trim()) return { success: false, error: "Memory content must not be empty" };
    const category = input.category?.trim() || null;
    const importance = input.importance ?? DEFAULT_IMPORTANCE;
    const createdAt = Math.floor(Date.now() / 1000);

    try {
      const memory = await this.store.withStore((db) =>
        db.prepare(
          `INSERT INTO memory (content, category, importance, created_at)
           VALUES (?, ?, ?, ?)
           RETURNING *`
        ).get(content, category, importance, createdAt) as MemoryEntry
      );
      return { success: true, memory };
    } catch (err) {
      if (err instanceof StoreSetupError) throw err;
      logFailure("store_memory", err);
      return { success: false, error: errorMessage(err) };
    }
  }

  async getMemory(memoryId: number): Promise<Lookup<MemoryEntry>> {
    return this.lookup("get_memory", (db) =>
      (db.prepare("SELECT * FROM memory WHERE id = ?").get(memoryId) as MemoryEntry | undefined) ?? null
    );
  }

  async searchMemory(keywords: readonly string[]): Promise<MemoryEntry[]> {
    const ftsQuery = buildKeywordQuery(keywords);
    if (!ftsQuery) return [];

    return this.readList("search_memory", (db) =>
      db.prepare(
        `SELECT m.id, m.content, m.category, m.importance, m.created_at
         FROM memory m
         JOIN memory_fts ON m.id = memory_fts.rowid
         WHERE memory_fts MATCH ?
         ORDER BY rank
         LIMIT ${MEMORY_SEARCH_LIMIT}`
      ).all(ftsQuery) as MemoryEntry[]
    );
  }

  async searchMemoryByCategory(category: string): Promise<MemoryEntry[]> {
    const wanted = category.trim();
    if (!wanted) return [];

    return this.readList("search_memory_by_category", (db) =>
      db.prepare(
        `SELECT * FROM memory
         WHERE category = ?
         ORDER BY importance DESC, created_at DESC, id DESC
         LIMIT ${CATEGORY_SEARCH_LIMIT}`
      ).all(wanted) as MemoryEntry[]
    );
  }

  async deleteMemory(memoryId: number): Promise<DeleteMemoryResult> {
    try {
      const changes = await this.store.withStore((db) =>
        db.prepare("DELETE FROM memory WHERE id = ?").run(memoryId).changes
      );
      if (changes === 0) {
        return { success: false, reason: "not_found", error: `No memory entry with id ${memoryId}` };
      }
      return { success: true };
    } catch (err) {
      if (err instanceof StoreSetupError) throw err;
      logFailure("delete_memory", err);
      return { success: false, reason: "failed", error: errorMessage(err) };
    }
  }

  private async readList<T>(operation: string, query: (db: Database.Database) => T[]): Promise<T[]> {
    try {
      return await this.store.withStore(query);
    } catch (err) {
      if (err instanceof StoreSetupError) throw err;
      logFailure(operation, err);
      return [];
    }
  }

  private async lookup<T>(operation: string, query: (db: Database.Database) => T | null): Promise<Lookup<T>> {
    try {
      const value = await this.store.withStore(query);
      return value === null ? { status: "not_found" } : { status: "found", value };
    } catch (err) {
      if (err instanceof StoreSetupError) throw err;
      logFailure(operation, err);
      return { status: "error", message: errorMessage(err) };
    }
  }
}

function logFailure(operation: string, err: unknown): void {
  console.error(`[recall-mcp] ${operation} failed: ${errorMessage(err)}`);
}
