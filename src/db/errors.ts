function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** The store could not be opened or its schema could not be applied. */
export class StoreSetupError extends Error {
  override readonly name = "StoreSetupError";

  constructor(
    readonly step: string,
    override readonly cause: unknown,
  ) {
    super(`Store setup failed at step "${step}": ${describe(cause)}`);
  }
}

/** The handle has been closed; no further work can be queued on it. */
export class StoreUnavailableError extends Error {
  override readonly name = "StoreUnavailableError";

  constructor(readonly dbPath: string) {
    super(`Store at ${dbPath} is closed`);
  }
}

export function errorMessage(err: unknown): string {
  return describe(err);
}
