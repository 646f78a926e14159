import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { MemoryIdParam } from "./schemas.js";
import { guardSetup, jsonError, jsonResult } from "./respond.js";

export function registerDeleteMemory(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "delete_memory",
    "Delete a memory entry by its ID. A missing id yields { success: false, reason: 'not_found' }.",
    {
      memory_id: MemoryIdParam.describe("The ID of the memory entry to remove"),
    },
    async ({ memory_id }) =>
      guardSetup(async () => {
        const result = await db.deleteMemory(memory_id);
        if (!result.success && result.reason === "failed") {
          return jsonError(result);
        }
        return jsonResult(result);
      })
  );
}
