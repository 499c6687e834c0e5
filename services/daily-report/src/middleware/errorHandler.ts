import type { Request, Response, NextFunction } from 'express';
import { logger } from '@funnelreport/shared';

export interface AppError extends Error {
  statusCode?: number;
  status?: string;
  operational?: boolean;
  details?: unknown;
}

export const createError = (
  message: string,
  statusCode: number = 500,
  details?: unknown,
  operational: boolean = true
): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
  error.operational = operational;
  error.details = details;
  return error;
};

// body-parser reports oversized and undecodable bodies through `status`/`type`
const fromBodyParser = (err: AppError & { type?: unknown }): AppError => {
  if (err.type === 'entity.too.large') {
    return createError('Request payload is too large', 413);
  }
  if (err.type === 'entity.parse.failed') {
    return createError('Request body is not valid JSON', 400);
  }
  return err;
};

// Global error handler middleware
export const errorHandler = (
  rawError: AppError,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
) => {
  const err = fromBodyParser(rawError);
  const statusCode = err.statusCode ?? 500;
  const status = err.status ?? 'error';

  const errorLog = {
    message: err.message,
    stack: err.stack,
    statusCode,
    status,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
    requestId: req.headers['x-request-id'] || 'unknown',
  };

  if (statusCode >= 500) {
    logger.error('Server Error', errorLog);
  } else {
    logger.warn('Client Error', errorLog);
  }

  res.status(statusCode).json(createErrorResponse(err, statusCode, status, req));
};

const createErrorResponse = (err: AppError, statusCode: number, status: string, req: Request) => {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isProduction = process.env.NODE_ENV === 'production';

  const baseResponse = {
    status,
    timestamp: new Date().toISOString(),
    path: req.url,
    method: req.method,
    requestId: req.headers['x-request-id'] || undefined,
  };

  // Production environment - minimal error info
  if (isProduction && statusCode >= 500) {
    return {
      ...baseResponse,
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    };
  }

  return {
    ...baseResponse,
    error: err.message,
    ...(err.details !== undefined && { details: err.details }),
    ...(isDevelopment && { stack: err.stack }),
  };
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(`Route ${req.method} ${req.originalUrl} not found`, 404));
};
