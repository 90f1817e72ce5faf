/**
 * Application error hierarchy.
 *
 * Every error the services throw on purpose extends AppError, so the bot layer
 * and the HTTP error handler can turn it into a reply without inspecting
 * driver-specific details.
 */

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export type AuthorizationErrorCode =
  | 'NOT_AUTHORIZED'
  | 'ALREADY_REJECTED'
  | 'QUEUE_FULL';

export class AuthorizationError extends AppError {
  constructor(
    public readonly reason: AuthorizationErrorCode,
    message: string,
  ) {
    super(403, message, reason);
    this.name = 'AuthorizationError';
  }
}

export type ValidationErrorCode =
  | 'INVALID_OFFSET'
  | 'INVALID_STATE'
  | 'INVALID_TIME'
  | 'INVALID_TARGET'
  | 'VALIDATION_ERROR';

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly reason: ValidationErrorCode = 'VALIDATION_ERROR',
    public details?: unknown,
  ) {
    super(400, message, reason);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Compare-and-swap mismatch. Expected when two claims race for one record.
 */
export class StateConflictError extends AppError {
  constructor(
    message: string,
    public readonly expected?: string,
    public readonly actual?: string,
  ) {
    super(409, message, 'STATE_CONFLICT');
    this.name = 'StateConflictError';
  }
}

export class RepositoryError extends AppError {
  /** SQLSTATE reported by the driver, e.g. 23505 for unique_violation */
  readonly driverCode?: string;

  constructor(message: string, originalError?: unknown) {
    super(503, message, 'REPOSITORY_ERROR');
    this.name = 'RepositoryError';
    if (originalError instanceof Error) {
      this.stack = originalError.stack;
      this.driverCode = readDriverCode(originalError);
    }
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

const readDriverCode = (error: Error): string | undefined => {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
