import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { ConversationIdParam } from "./schemas.js";
import { errorResult, guardSetup, jsonResult } from "./respond.js";

export function registerGetConversation(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "get_conversation",
    "Retrieve a complete conversation thread, including all messages, tool calls and responses in chronological order. Returns { not_found: true } when the id does not exist.",
    {
      conversation_id: ConversationIdParam,
    },
    async ({ conversation_id }) =>
      guardSetup(async () => {
        const result = await db.getConversation(conversation_id);
        switch (result.status) {
          case "found":
            return jsonResult(result.value);
          case "not_found":
            return jsonResult({ not_found: true, conversation_id });
          case "error":
            return errorResult(`Could not read conversation ${conversation_id}: ${result.message}`);
        }
      })
  );
}
