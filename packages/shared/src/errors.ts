export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super('AUTHENTICATION_REQUIRED', message, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super('AUTHORIZATION_DENIED', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string | number) {
    super('NOT_FOUND', id !== undefined ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

/**
 * A database failure inside a unit of work. The transaction has already been
 * rolled back by the time this reaches the caller.
 */
export class PersistenceFailureError extends AppError {
  constructor(operation: string, public cause?: unknown) {
    super('PERSISTENCE_FAILURE', `Could not complete ${operation}. Nothing was saved.`, 503);
  }
}

export class InsufficientCreditError extends AppError {
  constructor(userId: number, requiredCents: number) {
    super(
      'INSUFFICIENT_CREDIT',
      `User ${userId} does not have enough credit (needs ${(requiredCents / 100).toFixed(2)})`,
      402,
    );
  }
}
