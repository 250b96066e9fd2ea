export type MemoryGraphErrorCode = "INVALID_INPUT" | "PERSISTENCE_FAILURE" | "CONFIG";

export class MemoryGraphError extends Error {
  constructor(
    readonly code: MemoryGraphErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Empty or malformed caller input. Nothing has been written. */
export class InvalidInputError extends MemoryGraphError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** The storage transaction could not commit and was rolled back. */
export class PersistenceError extends MemoryGraphError {
  constructor(message: string, cause?: unknown) {
    super("PERSISTENCE_FAILURE", message, { cause });
  }
}

export class ConfigError extends MemoryGraphError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
