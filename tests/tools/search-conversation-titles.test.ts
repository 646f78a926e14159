import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, seedConversations } from "../helpers/test-db.js";
import { RecallDatabase, likePattern } from "../../src/db/database.js";

describe("search_conversation_titles tool", () => {
  let db: RecallDatabase;

  beforeEach(async () => {
    db = createTestDb();
    await seedConversations(db, [
      {
        id: "a",
        title: "Kotlin coroutines",
        created_at: 100,
        messages: [
          { id: 1, role: "user", content: "q", created_at: 101 },
          { id: 2, role: "assistant", content: "a", created_at: 102 },
        ],
      },
      { id: "b", title: "Snacks for the kotlin meetup", created_at: 200 },
      { id: "c", title: "100% done_list", created_at: 300 },
      { id: "d", title: "1000 things", created_at: 400 },
    ]);
  });

  afterEach(async () => {
    await db.store.close();
  });

  it("matches a substring of the title, newest first, with message counts", async () => {
    const results = await db.searchConversationTitles("otlin");

    expect(results).toEqual([
      { id: "b", title: "Snacks for the kotlin meetup", created_at: 200, title_generated: 0, profile_name: null, message_count: 0 },
      { id: "a", title: "Kotlin coroutines", created_at: 100, title_generated: 0, profile_name: null, message_count: 2 },
    ]);
  });

  it("treats % and _ in the query literally", async () => {
    expect((await db.searchConversationTitles("0%")).map((r) => r.id)).toEqual(["c"]);
    expect((await db.searchConversationTitles("done_")).map((r) => r.id)).toEqual(["c"]);
  });

  it("returns an empty list when nothing matches", async () => {
    expect(await db.searchConversationTitles("kubernetes")).toEqual([]);
  });

  it("caps results at 100", async () => {
    await seedConversations(
      db,
      Array.from({ length: 120 }, (_, i) => ({ id: `bulk-${i}`, title: `Weekly sync ${i}`, created_at: 1_000 + i }))
    );

    const results = await db.searchConversationTitles("Weekly sync");

    expect(results).toHaveLength(100);
    expect(results[0]?.id).toBe("bulk-119");
  });
});

describe("likePattern", () => {
  it("wraps the query in wildcards and escapes LIKE metacharacters", () => {
    expect(likePattern("a%b_c\\d")).toBe("%a\\%b\\_c\\\\d%");
  });
});
