// Storage faults surface as StorageError; a duplicate username is reported
// by the drivers as UniqueConstraintError and turned into `false` by createUser.

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class UniqueConstraintError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UniqueConstraintError';
  }
}

export class NotFoundError extends Error {
  username: string;

  constructor(username: string) {
    super(`User '${username}' not found`);
    this.name = 'NotFoundError';
    this.username = username;
  }
}

export class ValidationError extends Error {
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** Reads the string `code` that driver errors (sqlite, mysql) carry. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
