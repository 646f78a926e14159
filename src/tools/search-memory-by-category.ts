import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { CategoryParam } from "./schemas.js";
import { guardSetup, jsonResult } from "./respond.js";

export function registerSearchMemoryByCategory(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "search_memory_by_category",
    "List memory entries with exactly this category, most important first, then most recent. Returns up to 50.",
    {
      category: CategoryParam.describe("Category to filter by (e.g. 'work', 'personal')"),
    },
    async ({ category }) =>
      guardSetup(async () => {
        const items = await db.searchMemoryByCategory(category);
        return jsonResult({ items });
      })
  );
}
