export type MemoryErrorCode =
  | "NOT_FOUND"
  | "BACKEND_UNAVAILABLE"
  | "MALFORMED_RECORD"
  | "CONFIG_INVALID"
  | "LEDGER_WRITE";

export class MemoryError extends Error {
  constructor(
    message: string,
    public readonly code: MemoryErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "MemoryError";
  }
}

/** Validate/reject on a name with no pending quarantine record. */
export class NotFoundError extends MemoryError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/** Vector service unreachable, timed out, or answered with an error status. */
export class BackendUnavailableError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super(message, "BACKEND_UNAVAILABLE", cause);
    this.name = "BackendUnavailableError";
  }
}

export class MalformedRecordError extends MemoryError {
  constructor(
    message: string,
    public readonly recordPath: string,
    cause?: unknown,
  ) {
    super(message, "MALFORMED_RECORD", cause);
    this.name = "MalformedRecordError";
  }
}

export class ConfigInvalidError extends MemoryError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigInvalidError";
  }
}

export class LedgerWriteError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super(message, "LEDGER_WRITE", cause);
    this.name = "LedgerWriteError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
