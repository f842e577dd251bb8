import { Request, Response, NextFunction } from 'express';
import { logger, LogCategory } from '../utils/Logger';

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export function createErrorHandler(exposeErrors: boolean) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      logger.warn(LogCategory.API, `AppError: ${err.message}`, { statusCode: err.statusCode, path: req.path });
      res.status(err.statusCode).json({
        success: false,
        error: err.message,
      });
      return;
    }

    logger.error(LogCategory.API, 'Unhandled error', { error: err.message, stack: err.stack, path: req.path });

    res.status(500).json({
      success: false,
      error: exposeErrors ? err.message : 'Internal server error',
    });
  };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404));
}
