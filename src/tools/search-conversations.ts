import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { KeywordsParam } from "./schemas.js";
import { guardSetup, jsonResult } from "./respond.js";

export function registerSearchConversations(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "search_conversations",
    "Search across all past conversations with the user using full-text search. Matches message content against any of the given keywords and returns up to 50 hits, newest first, with a 200-character content preview.",
    {
      keywords: KeywordsParam,
    },
    async ({ keywords }) =>
      guardSetup(async () => {
        const items = await db.searchConversations(keywords);
        return jsonResult({ items });
      })
  );
}
