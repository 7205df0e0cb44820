import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { AppError } from '@barflow/shared';
import type { ApiError } from '@barflow/shared';
import { logger, errorFields } from '@barflow/core/observability/logger';

export interface ErrorResponse {
  status: number;
  body: ApiError;
}

export function toErrorResponse(error: unknown, exposeInternal: boolean): ErrorResponse {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.message,
          ...(error.details ? { details: error.details } : {}),
        },
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: error.issues.map((issue) => ({
            field: issue.path.join('.') || '(root)',
            message: issue.message,
          })),
        },
      },
    };
  }

  const message = exposeInternal && error instanceof Error ? error.message : 'Internal server error';
  return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message } } };
}

/** Last middleware: maps anything thrown by a route to the JSON error shape. */
export function errorHandler(options: { exposeInternal: boolean }): ErrorRequestHandler {
  return (error, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const { status, body } = toErrorResponse(error, options.exposeInternal);
    if (status >= 500) {
      logger.error('Unhandled route error', {
        requestId: typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined,
        method: req.method,
        path: req.path,
        error: errorFields(error),
      });
    }
    res.status(status).json(body);
  };
}
