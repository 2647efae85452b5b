import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Errors raised by body-parser carry the HTTP status and a `type` tag.
 */
function isBodyParserError(err: Error): err is Error & { status: number; type: string } {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/**
 * Maps framework errors onto AppError; anything else passes through.
 */
export function toAppError(err: Error): Error {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`);
    return AppError.badRequest(`Validation failed: ${details.join('; ')}`);
  }

  if (err instanceof MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? AppError.payloadTooLarge('Uploaded file is too large')
      : AppError.badRequest(err.message);
  }

  if (isBodyParserError(err)) {
    if (err.type === 'entity.too.large') {
      return AppError.payloadTooLarge('Request body is too large');
    }
    if (err.status >= 400 && err.status < 500) {
      return AppError.badRequest('Malformed request body');
    }
  }

  return err;
}

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = toAppError(err);

  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    message = error.message;
    isOperational = error.isOperational;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', error);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: error.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
