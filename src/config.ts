import { z } from "zod";

export const DB_PATH_ENV = "RECALL_DB_PATH";

export interface RecallConfig {
  /** Location of the SQLite file shared with the chat application. */
  dbPath: string;
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

const ConfigSchema = z.object({
  dbPath: z
    .string({ required_error: `${DB_PATH_ENV} must be set (or pass --db <path>)` })
    .trim()
    .min(1, `${DB_PATH_ENV} must not be empty`),
});

/**
 * Resolve the store path. An explicit `--db` flag wins over the environment;
 * with neither there is nothing to serve, so this throws ConfigError.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  dbFlag?: string,
): RecallConfig {
  const parsed = ConfigSchema.safeParse({ dbPath: dbFlag ?? env[DB_PATH_ENV] });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

/** Value of `--db <path>` in an argv array, if present. */
export function dbFlagFrom(argv: readonly string[]): string | undefined {
  const i = argv.indexOf("--db");
  if (i === -1) return undefined;
  const value = argv[i + 1];
  return value !== undefined && !value.startsWith("--") ? value : undefined;
}
