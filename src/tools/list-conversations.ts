import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { PaginationParams } from "./schemas.js";
import { guardSetup, jsonResult } from "./respond.js";

export function registerListConversations(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "list_conversations",
    "List past conversations, most recent first, with message counts. Use limit and offset to page through history.",
    {
      ...PaginationParams,
    },
    async ({ limit, offset }) =>
      guardSetup(async () => {
        const items = await db.listConversations({ limit, offset });
        return jsonResult({ items });
      })
  );
}
