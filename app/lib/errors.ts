/**
 * Error taxonomy shared by the HTTP layer, the dispatcher and the task runtime.
 *
 * Errors raised before a task exists abort the request synchronously.
 * Errors raised while a task runs are captured into the task's `error` field.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
    readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHENTICATED', 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'Access denied', details?: ErrorDetails) {
    super(message, 'ACCESS_DENIED', 403, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'NOT_FOUND', 404, details);
  }
}

export type StoreErrorReason = 'not-found' | 'access-denied' | 'conflict' | 'unavailable';

const STORE_ERROR_CODES: Record<StoreErrorReason, string> = {
  'not-found': 'NOT_FOUND',
  'access-denied': 'ACCESS_DENIED',
  conflict: 'CONFLICT',
  unavailable: 'STORE_UNAVAILABLE',
};

/**
 * A call to the object store failed as a whole (as opposed to a single key
 * inside a batch delete, which is reported per key).
 */
export class StoreError extends AppError {
  constructor(
    readonly reason: StoreErrorReason,
    readonly operation: string,
    message: string,
    details?: ErrorDetails
  ) {
    super(message, STORE_ERROR_CODES[reason], 502, { operation, ...details });
  }
}

/**
 * Raised at a checkpoint once cancellation has been requested.
 * Not an AppError: a cancelled task is a terminal status, not a failure.
 */
export class TaskCancelledError extends Error {
  constructor() {
    super('Task cancelled');
    this.name = 'TaskCancelledError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
