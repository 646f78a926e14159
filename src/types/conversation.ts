export const SEARCH_RESULT_LIMIT = 50;
export const TITLE_SEARCH_LIMIT = 100;
export const CONTENT_PREVIEW_LEN = 200;
export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

export interface Message {
  id: number;
  conversation_id: string;
  role: string;
  content: string;
  created_at: number;
  tool_calls: string | null;
  tool_call_id: string | null;
  tool_name: string | null;
  tool_status: string | null;
  tool_params_json: string | null;
  tool_result_json: string | null;
  reasoning_content: string | null;
}

export interface Conversation {
  id: string;
  title: string;
  created_at: number;
  title_generated: number;
  profile_name: string | null;
  /** Chronological: created_at ascending. */
  messages: Message[];
}

export interface ConversationSummary {
  id: string;
  title: string;
  created_at: number;
  title_generated: number;
  profile_name: string | null;
  message_count: number;
}

/** A single message hit from search_conversations. */
export interface SearchResult {
  conversation_id: string;
  message_id: number;
  role: string;
  content_preview: string;
  created_at: number;
}

export interface ListConversationsInput {
  limit?: number;
  offset?: number;
}
