export type ErrorKind = 'ValidationError' | 'NotFound' | 'SchemaMissing' | 'StorageError';

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';
  readonly kind = 'ValidationError';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND';
  readonly kind = 'NotFound';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class SchemaMissingError extends Error {
  readonly code = 'SCHEMA_MISSING';
  readonly kind = 'SchemaMissing';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'SchemaMissingError';
  }
}

export class StorageError extends Error {
  readonly code = 'STORAGE_ERROR';
  readonly kind = 'StorageError';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'StorageError';
  }
}

export type CoreError = ValidationError | NotFoundError | SchemaMissingError | StorageError;

export function isCoreError(error: unknown): error is CoreError {
  return (
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof SchemaMissingError ||
    error instanceof StorageError
  );
}

/** SQLite result code carried by a driver error, if any (e.g. `SQLITE_BUSY`). */
export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code.startsWith('SQLITE_') ? error.code : undefined;
  }
  return undefined;
}

/**
 * Wraps a raw driver failure. Constraint messages are reduced to a summary so
 * SQL text never reaches the caller; the original error stays in `details`.
 */
export function toStorageError(error: unknown, operation: string): StorageError {
  if (error instanceof StorageError) return error;

  const raw = error instanceof Error ? error.message : String(error);
  const summary = raw.includes('UNIQUE constraint')
    ? 'a record with this identifier already exists'
    : raw.includes('CHECK constraint')
      ? 'a value violates a column constraint'
      : raw.includes('NOT NULL constraint')
        ? 'a required column was missing'
        : raw.includes('FOREIGN KEY constraint')
          ? 'referenced record does not exist'
          : 'a database error occurred';

  return new StorageError(`${operation} failed: ${summary}`, {
    cause: raw,
    sqliteCode: sqliteCode(error),
  });
}
