import { Response } from 'express';
import { ApiResponse } from '../types';

const now = (): string => new Date().toISOString();

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: now(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    message,
    timestamp: now(),
  };

  return res.status(statusCode).json(response);
};
