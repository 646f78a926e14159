import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { KeywordsParam } from "./schemas.js";
import { guardSetup, jsonResult } from "./respond.js";

export function registerSearchMemory(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "search_memory",
    "Full-text search over stored memory entries. Any keyword may match; results are ranked by relevance, best first, up to 10.",
    {
      keywords: KeywordsParam,
    },
    async ({ keywords }) =>
      guardSetup(async () => {
        const items = await db.searchMemory(keywords);
        return jsonResult({ items });
      })
  );
}
