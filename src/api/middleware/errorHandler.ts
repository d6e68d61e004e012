/**
 * Global error handler middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AnalysisError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
}

export interface ErrorResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

/**
 * Status and JSON body sent for an error. Production responses carry no
 * details or stack.
 */
export function toErrorResponse(
  err: ApiError,
  isProduction: boolean = config.isProduction
): ErrorResponse {
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
  }

  // Analysis errors and anything else carrying a status code
  if (err instanceof AnalysisError || err.statusCode) {
    return {
      statusCode: err.statusCode ?? 500,
      body: {
        error: err.message,
        code: err.code || 'ERROR',
        ...(isProduction ? {} : { details: err.details }),
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: isProduction ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR',
      ...(isProduction ? {} : { stack: err.stack }),
    },
  };
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, body } = toErrorResponse(err);
  const logContext = {
    error: err.message,
    path: req.path,
    method: req.method,
    code: err.code,
  };

  if (statusCode < 500) {
    errorLogger.warn(logContext, 'Request rejected');
  } else {
    errorLogger.error({ ...logContext, stack: err.stack }, 'Request error');
  }

  res.status(statusCode).json(body);
}
