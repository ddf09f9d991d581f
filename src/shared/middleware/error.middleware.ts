/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { logger } from '../services/logger.service';
import { AppError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { errorResponse } from '../types/api.types';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const logMeta = {
    error: error.message,
    path: req.path,
    method: req.method,
    requestId: req.get('x-request-id')
  };

  if (error instanceof AppError) {
    if (!error.isOperational || error.statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
      logger.error('Request error', { ...logMeta, code: error.code, stack: error.stack });
    } else {
      logger.warn('Request rejected', { ...logMeta, code: error.code });
    }
    res.status(error.statusCode).json(errorResponse(error.code, error.message, error.details));
    return;
  }

  // Upload limits and malformed multipart bodies
  if (error instanceof multer.MulterError) {
    logger.warn('Upload rejected', { ...logMeta, code: error.code });
    const status = error.code === 'LIMIT_FILE_SIZE' ? HTTP_STATUS.PAYLOAD_TOO_LARGE : HTTP_STATUS.BAD_REQUEST;
    res.status(status).json(errorResponse(ErrorCode.VALIDATION_FILE_INVALID, error.message, { field: error.field }));
    return;
  }

  // Malformed JSON from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    logger.warn('Invalid JSON body', logMeta);
    res.status(HTTP_STATUS.BAD_REQUEST).json(
      errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid JSON body', { reason: error.message })
    );
    return;
  }

  // Unknown error - send generic response
  logger.error('Unhandled request error', { ...logMeta, stack: error.stack });
  res.status(HTTP_STATUS.INTERNAL_ERROR).json(
    errorResponse(
      ErrorCode.INTERNAL_ERROR,
      config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    )
  );
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json(
    errorResponse('NOT_FOUND', `Cannot ${req.method} ${req.path}`)
  );
}
