import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { MemoryIdParam } from "./schemas.js";
import { errorResult, guardSetup, jsonResult } from "./respond.js";

export function registerGetMemory(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "get_memory",
    "Retrieve a memory entry by its ID. Returns { not_found: true } when the id does not exist.",
    {
      memory_id: MemoryIdParam,
    },
    async ({ memory_id }) =>
      guardSetup(async () => {
        const result = await db.getMemory(memory_id);
        switch (result.status) {
          case "found":
            return jsonResult(result.value);
          case "not_found":
            return jsonResult({ not_found: true, memory_id });
          case "error":
            return errorResult(`Could not read memory ${memory_id}: ${result.message}`);
        }
      })
  );
}
