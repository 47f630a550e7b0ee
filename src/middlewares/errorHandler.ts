import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Multer reports size and field problems with its own error class
 */
const fromMulterError = (err: multer.MulterError): AppError =>
  err.code === 'LIMIT_FILE_SIZE'
    ? new AppError(`File is larger than ${env.MAX_UPLOAD_MB} MB`, 413)
    : AppError.badRequest(`Upload rejected: ${err.message}`);

/**
 * express.json() rejects malformed bodies with a SyntaxError tagged by type
 */
const isMalformedBody = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

const normalizeError = (err: Error): Error => {
  if (err instanceof multer.MulterError) return fromMulterError(err);
  if (isMalformedBody(err)) return AppError.badRequest('Malformed JSON body');
  return err;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = normalizeError(err);

  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;

  // Check if it's our custom AppError
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
    ...('kind' in error && typeof error.kind === 'string' && { kind: error.kind }),
    ...(env.NODE_ENV === 'development' && {
      stack: error.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
