/**
 * Centralized error handling middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import { AppError, NotFoundError, ValidationError } from '../utils/errors';

const logger = createLogger('HttpServer');

interface ErrorResponseBody {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string;
  };
}

// Request logging middleware
export const requestLogger: RequestHandler = (req, res, next) => {
  const start = Date.now();

  res.on('finish', () => {
    logger.debug('Request handled', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`,
    });
  });

  next();
};

// Validation error handler
const handleValidationError = (error: ZodError): AppError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    'VALIDATION_ERROR',
    error.errors,
  );
};

// Main error handling middleware
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  let appError: AppError;

  if (error instanceof AppError) {
    appError = error;
  } else if (error instanceof ZodError) {
    appError = handleValidationError(error);
  } else {
    // Unknown error - don't leak details in production
    appError = new AppError(
      500,
      process.env.NODE_ENV === 'production'
        ? 'Something went wrong'
        : error.message,
      'INTERNAL_ERROR',
      false,
    );
  }

  const logData = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      stack: appError.stack,
    },
    request: {
      method: req.method,
      path: req.path,
      ip: req.ip,
    },
  };

  if (appError.statusCode >= 500) {
    logger.error('Server error', logData);
  } else {
    logger.warn('Client error', logData);
  }

  const response: ErrorResponseBody = {
    error: {
      message: appError.message,
      code: appError.code || 'UNKNOWN_ERROR',
    },
  };

  // Include additional details in development
  if (process.env.NODE_ENV === 'development') {
    if (appError instanceof ValidationError) {
      response.error.details = appError.details;
    }
    if (!appError.isOperational) {
      response.error.stack = appError.stack;
    }
  }

  res.status(appError.statusCode).json(response);
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
};
