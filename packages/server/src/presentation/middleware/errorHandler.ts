/**
 * Error Handler Middleware
 *
 * Express error handling middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { DomainError, ChunkTooLargeError, IncompleteChunkSetError } from '@clipvault/common-types';

/**
 * Error handling middleware
 *
 * Turns domain errors into HTTP status codes
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Response already started: hand over to Express' default handler
  if (res.headersSent) {
    return next(error);
  }

  // Body parser limit on a route that does not translate it itself
  if (isPayloadTooLarge(error)) {
    console.warn(`⚠️ [ErrorHandler] Payload too large: ${req.method} ${req.path}`);
    res.status(413).json({
      error: 'Request body is too large',
      code: 'PAYLOAD_TOO_LARGE',
    });
    return;
  }

  console.error('[ErrorHandler]', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  if (error instanceof DomainError) {
    handleDomainError(error, res);
  } else {
    handleGenericError(error, res);
  }
}

/**
 * Rejection raised by the body parser when a body exceeds its limit
 */
export function isPayloadTooLarge(error: unknown): boolean {
  return error instanceof Error && 'type' in error && error.type === 'entity.too.large';
}

/**
 * Domain error -> HTTP response
 */
function handleDomainError(error: DomainError, res: Response): void {
  const statusCode = getStatusCodeForDomainError(error);

  res.status(statusCode).json({
    error: error.message,
    code: error.code,
    ...(error instanceof IncompleteChunkSetError && { missing_indexes: error.missingIndexes }),
    ...(error instanceof ChunkTooLargeError && { max_bytes: error.maxBytes }),
  });
}

/**
 * Domain error code -> HTTP status code
 */
export function getStatusCodeForDomainError(error: DomainError): number {
  switch (error.code) {
    // 404 Not Found
    case 'VIDEO_NOT_FOUND':
    case 'MEDIA_RECORD_NOT_FOUND':
      return 404;

    // 400 Bad Request
    case 'UPLOAD_NOT_STARTED':
    case 'INVALID_STATUS_TRANSITION':
    case 'INVALID_OPERATION':
    case 'INVALID_CHUNK':
    case 'INCOMPLETE_CHUNK_SET':
      return 400;

    // 409 Conflict
    case 'UPLOAD_IN_PROGRESS_CONFLICT':
      return 409;

    // 413 Payload Too Large
    case 'CHUNK_TOO_LARGE':
      return 413;

    // 500 Internal Server Error
    case 'STORAGE_ACCESS_ERROR':
      return 500;

    default:
      return 500;
  }
}

/**
 * Generic error -> HTTP response
 */
function handleGenericError(error: Error, res: Response): void {
  // Hide details outside development
  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    error: isDevelopment ? error.message : 'Internal server error',
    ...(isDevelopment && { stack: error.stack }),
  });
}

/**
 * Wrap an async route handler so rejections reach next()
 *
 * router.get('/path', asyncHandler(async (req, res) => {
 *   res.json(await someAsyncOperation());
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
