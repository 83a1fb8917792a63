/**
 * Application error taxonomy.
 *
 * Every error the services raise on purpose is an AppError; the error
 * middleware turns `statusCode` and `code` into the HTTP response.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT', 400);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'STORAGE_ERROR', 503);
    this.name = 'StorageError';
  }
}

// PostgreSQL SQLSTATE codes the application reacts to
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_NUMERIC_OUT_OF_RANGE = '22003';

export const getPgErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Translate a low-level persistence failure into the application taxonomy.
 * AppErrors pass through untouched.
 */
export const toStorageError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  const pgCode = getPgErrorCode(error);

  if (pgCode === PG_UNIQUE_VIOLATION) {
    return new ConflictError('A record with the same key already exists');
  }

  if (pgCode === PG_NUMERIC_OUT_OF_RANGE) {
    return new InvalidArgumentError('Value out of range for its column');
  }

  return new StorageError(`Storage failure: ${errorMessage(error)}`, error);
};
