import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTestDb } from "../helpers/test-db.js";
import { RecallDatabase } from "../../src/db/database.js";

describe("delete_memory tool", () => {
  let db: RecallDatabase;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(async () => {
    await db.store.close();
  });

  it("deletes an existing memory", async () => {
    const stored = await db.storeMemory({ content: "To be deleted", category: "temp" });
    if (!stored.success) throw new Error(stored.error);

    expect(await db.deleteMemory(stored.memory.id)).toEqual({ success: true });
    expect(await db.getMemory(stored.memory.id)).toEqual({ status: "not_found" });
    expect(await db.searchMemoryByCategory("temp")).toEqual([]);
  });

  it("reports not_found for an id that was never stored", async () => {
    expect(await db.deleteMemory(31337)).toEqual({
      success: false,
      reason: "not_found",
      error: "No memory entry with id 31337",
    });
  });

  it("reports not_found when deleting twice", async () => {
    const stored = await db.storeMemory({ content: "once" });
    if (!stored.success) throw new Error(stored.error);

    await db.deleteMemory(stored.memory.id);

    expect(await db.deleteMemory(stored.memory.id)).toMatchObject({ success: false, reason: "not_found" });
  });

  it("reports a store failure distinctly from not_found", async () => {
    await db.store.close();
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await db.deleteMemory(1);

    expect(result).toMatchObject({ success: false, reason: "failed" });
    spy.mockRestore();
  });
});
