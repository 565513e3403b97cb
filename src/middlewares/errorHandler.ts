import { Request, Response, NextFunction } from 'express';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Client errors raised by Express itself (malformed JSON, oversized body)
 * carry a 4xx `status`.
 */
const clientErrorStatus = (err: Error): number | null =>
  'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : null;

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal Server Error';
  let type = 'InternalError';
  let isOperational = false;

  const clientStatus = clientErrorStatus(err);

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    type = err.name;
    isOperational = err.isOperational;
  } else if (clientStatus !== null) {
    statusCode = clientStatus;
    message = err.message;
    type = 'BadRequest';
    isOperational = true;
  }

  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error (${type}): ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    type,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
