import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode, InfrastructureError } from '../types/error.types';
import { createErrorResponse, toErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';

// Seconds a client should wait before retrying a LOCK_TIMEOUT or STORE_UNAVAILABLE
const RETRY_AFTER_SECONDS = 1;

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Global error handling middleware
 *
 * Business rejections are logged at warn, infrastructure and unknown
 * errors at error. Every response has the `{error:{code,message,details}}` shape.
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const context = { path: req.path, method: req.method };

  // Zod validation errors
  if (err instanceof ZodError) {
    const errors = err.errors.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    logger.warn('Request validation failed', { ...context, errors });
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', { errors }));
  }

  if (isMalformedJson(err)) {
    logger.warn('Malformed JSON body', context);
    return res.status(400).json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
  }

  if (err instanceof InfrastructureError) {
    logger.error('Infrastructure error', { ...context, code: err.code, error: err.message });
    res.setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    return res.status(err.statusCode).json(toErrorResponse(err));
  }

  // AppError (known application errors)
  if (err instanceof AppError) {
    logger.warn('Request rejected', { ...context, code: err.code, error: err.message });
    return res.status(err.statusCode).json(toErrorResponse(err));
  }

  // Unknown errors - don't expose internals
  logger.error('Unhandled error', { ...context, error: err.message, stack: err.stack });
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
