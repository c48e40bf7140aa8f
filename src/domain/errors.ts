/**
 * Application error types
 * Each error type carries a stable code and the HTTP status the API answers with
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Hardware collection failed or produced nothing usable (502 Bad Gateway)
 */
export class CollectionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'COLLECTION_ERROR', 502, details);
  }
}

/**
 * A durable write did not commit (500 Internal Server Error)
 */
export class PersistenceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', 500, details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Task kind outside the supported set (400 Bad Request)
 */
export class UnknownTaskKindError extends AppError {
  constructor(kind: string) {
    super(`unknown task kind: ${kind}`, 'UNKNOWN_TASK_KIND', 400, { kind });
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Human-readable message for anything thrown
 */
export function formatFailureReason(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}
