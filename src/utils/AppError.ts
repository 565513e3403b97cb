/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }
}

export default AppError;
