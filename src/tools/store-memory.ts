import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { StoreMemorySchema } from "./schemas.js";
import { guardSetup, jsonError, jsonResult } from "./respond.js";

export function registerStoreMemory(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "store_memory",
    "Store a fact or note for later recall. Entries are never edited: to change one, delete it and store a new one.",
    StoreMemorySchema.shape,
    async ({ content, category, importance }) =>
      guardSetup(async () => {
        const result = await db.storeMemory({ content, category, importance });
        if (!result.success) return jsonError(result);
        return jsonResult(result.memory);
      })
  );
}
