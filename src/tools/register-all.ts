import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { registerSearchConversations } from "./search-conversations.js";
import { registerGetConversation } from "./get-conversation.js";
import { registerSearchConversationTitles } from "./search-conversation-titles.js";
import { registerListConversations } from "./list-conversations.js";
import { registerGetMessage } from "./get-message.js";
import { registerStoreMemory } from "./store-memory.js";
import { registerGetMemory } from "./get-memory.js";
import { registerSearchMemory } from "./search-memory.js";
import { registerSearchMemoryByCategory } from "./search-memory-by-category.js";
import { registerDeleteMemory } from "./delete-memory.js";

export function registerAllTools(server: McpServer, db: RecallDatabase): void {
  // Conversation history (read-only)
  registerSearchConversations(server, db);
  registerGetConversation(server, db);
  registerSearchConversationTitles(server, db);
  registerListConversations(server, db);
  registerGetMessage(server, db);

  // Memory notes
  registerStoreMemory(server, db);
  registerGetMemory(server, db);
  registerSearchMemory(server, db);
  registerSearchMemoryByCategory(server, db);
  registerDeleteMemory(server, db);
}
