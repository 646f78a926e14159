import { StoreSetupError } from "../db/errors.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function jsonResult(data: unknown): ToolResult {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(data),
      },
    ],
  };
}

export function errorResult(message: string): ToolResult {
  return {
    isError: true,
    content: [
      {
        type: "text" as const,
        text: message,
      },
    ],
  };
}

/** A structured failure: the JSON payload is kept, and the result is flagged. */
export function jsonError(data: unknown): ToolResult {
  return { ...jsonResult(data), isError: true };
}

/**
 * Run a tool body, reporting a store that failed to initialize as a tool
 * error (with the failing step) instead of an unhandled fault.
 */
export async function guardSetup(body: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await body();
  } catch (err) {
    if (err instanceof StoreSetupError) return errorResult(err.message);
    throw err;
  }
}
