export const DEFAULT_IMPORTANCE = 5;
export const MIN_IMPORTANCE = 1;
export const MAX_IMPORTANCE = 10;

export interface MemoryEntry {
  id: number;
  content: string;
  category: string | null;
  importance: number;
  /** Epoch seconds, assigned by the server at insert time. */
  created_at: number;
}

export interface StoreMemoryInput {
  content: string;
  category?: string;
  importance?: number;
}

export type StoreMemoryResult =
  | { success: true; memory: MemoryEntry }
  | { success: false; error: string };

/**
 * `not_found` means no row matched the id; `failed` means the statement
 * itself could not run. Callers must be able to tell the two apart.
 */
export type DeleteMemoryResult =
  | { success: true }
  | { success: false; reason: "not_found" | "failed"; error: string };
