/**
 * Outcome of an exact lookup. A missing row is a normal outcome, never an
 * error, and a failed query is never reported as missing.
 */
export type Lookup<T> =
  | { status: "found"; value: T }
  | { status: "not_found" }
  | { status: "error"; message: string };
