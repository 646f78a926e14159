import { RecallDatabase } from "../../src/db/database.js";
import { StoreHandle } from "../../src/db/store.js";

export function createTestDb(): RecallDatabase {
  return new RecallDatabase(new StoreHandle(":memory:"));
}

/**
 * Tables owned by the chat application. The server never creates them, so
 * tests that read conversations lay them down through this fixture.
 */
export const CONVERSATION_FIXTURE_SQL = `
  CREATE TABLE IF NOT EXISTS conversations (
    id               TEXT PRIMARY KEY,
    title            TEXT NOT NULL,
    created_at       INTEGER NOT NULL,
    title_generated  INTEGER NOT NULL DEFAULT 0,
    profile_name     TEXT
  );

  CREATE TABLE IF NOT EXISTS messages (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id    TEXT NOT NULL REFERENCES conversations(id),
    role               TEXT NOT NULL,
    content            TEXT NOT NULL,
    created_at         INTEGER NOT NULL,
    tool_calls         TEXT,
    tool_call_id       TEXT,
    tool_name          TEXT,
    tool_status        TEXT,
    tool_params_json   TEXT,
    tool_result_json   TEXT,
    reasoning_content  TEXT
  );

  CREATE VIRTUAL TABLE IF NOT EXISTS messages_fts USING fts5(
    content,
    content='messages',
    content_rowid='id'
  );

  CREATE TRIGGER IF NOT EXISTS messages_ai AFTER INSERT ON messages BEGIN
    INSERT INTO messages_fts(rowid, content) VALUES (new.id, new.content);
  END;
`;

export interface FixtureMessage {
  id: number;
  role: string;
  content: string;
  created_at: number;
  tool_name?: string;
  tool_call_id?: string;
  reasoning_content?: string;
}

export interface FixtureConversation {
  id: string;
  title: string;
  created_at: number;
  title_generated?: number;
  profile_name?: string;
  messages?: FixtureMessage[];
}

export async function seedConversations(db: RecallDatabase, conversations: FixtureConversation[]): Promise<void> {
  await db.store.withStore((conn) => {
    conn.exec(CONVERSATION_FIXTURE_SQL);
    const insertConv = conn.prepare(
      "INSERT INTO conversations (id, title, created_at, title_generated, profile_name) VALUES (?, ?, ?, ?, ?)"
    );
    const insertMsg = conn.prepare(
      `INSERT INTO messages (id, conversation_id, role, content, created_at, tool_name, tool_call_id, reasoning_content)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const seed = conn.transaction((items: FixtureConversation[]) => {
      for (const c of items) {
        insertConv.run(c.id, c.title, c.created_at, c.title_generated ?? 0, c.profile_name ?? null);
        for (const m of c.messages ?? []) {
          insertMsg.run(
            m.id, c.id, m.role, m.content, m.created_at,
            m.tool_name ?? null, m.tool_call_id ?? null, m.reasoning_content ?? null
          );
        }
      }
    });
    seed(conversations);
  });
}
