import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, logger } from '../utils';
import { ReconciliationError } from '../matching';
import { env } from '../config';

/**
 * Translate errors raised outside our own code into AppErrors
 */
const toAppError = (err: Error): AppError | null => {
  if (err instanceof AppError) {
    return err;
  }

  // Invalid datasets / thresholds are the caller's fault
  if (err instanceof ReconciliationError) {
    return AppError.badRequest(err.message);
  }

  if (err instanceof MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return AppError.payloadTooLarge(`Upload too large: ${err.field ?? 'file'}`);
    }
    return AppError.badRequest(`Upload error: ${err.message}`);
  }

  // body-parser errors (malformed JSON, payload too large) carry their own status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return new AppError(err.message, err.status);
  }

  return null;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = toAppError(err);

  // Default error values
  const statusCode = appError?.statusCode ?? 500;
  const message = appError?.message ?? 'Internal Server Error';
  const isOperational = appError?.isOperational ?? false;

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
