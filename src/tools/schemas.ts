import { z } from "zod";
import { MAX_IMPORTANCE, MIN_IMPORTANCE } from "../types/memory.js";

// ---------------------------------------------------------------------------
// Keyword list shared by search_conversations and search_memory.
// Empty lists and blank entries are allowed here; the service short-circuits
// them without touching the store.
// ---------------------------------------------------------------------------
export const KeywordsParam = z
  .array(z.string())
  .describe("Keywords to search for (OR semantics: any keyword may match)");

export const ConversationIdParam = z
  .string()
  .describe("The unique identifier of the conversation");

export const MessageIdParam = z
  .number()
  .int("message_id must be an integer")
  .describe("The unique identifier of the message");

export const MemoryIdParam = z
  .number()
  .int("memory_id must be an integer")
  .describe("The ID of the memory entry");

export const CategoryParam = z
  .string()
  .max(100, "A category cannot exceed 100 characters");

export const ImportanceParam = z
  .number()
  .int()
  .min(MIN_IMPORTANCE)
  .max(MAX_IMPORTANCE)
  .optional()
  .describe("Priority score 1-10 (default: 5)");

// ---------------------------------------------------------------------------
// Pagination for list_conversations. Upper bounds are not enforced here:
// the service clamps limit to 200 whatever arrives.
// ---------------------------------------------------------------------------
export const PaginationParams = {
  limit: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Maximum number of conversations to return (default: 50, max: 200)"),
  offset: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Number of conversations to skip (default: 0)"),
};

export const StoreMemorySchema = z.object({
  content: z
    .string()
    .min(1, "Content cannot be empty")
    .max(10_000, "Content cannot exceed 10,000 characters")
    .describe("The fact or information to remember"),
  category: CategoryParam.optional().describe("A tag for grouping (e.g. 'workflow', 'preferences')"),
  importance: ImportanceParam,
});
