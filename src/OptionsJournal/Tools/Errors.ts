/**
 * Errors.ts — Error taxonomy for the journal
 *
 * ValidationError: an event or batch the engine refuses. The batch is skipped.
 * StorageError: a record could not be read, written or relocated.
 */

export class JournalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JournalError";
  }
}

export class ValidationError extends JournalError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class StorageError extends JournalError {
  readonly path: string;

  constructor(path: string, action: string, cause: unknown) {
    super(`Failed to ${action} ${path}: ${describeError(cause)}`, { cause });
    this.name = "StorageError";
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
