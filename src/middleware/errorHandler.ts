import { Request, Response, NextFunction } from 'express';
import { AppError, ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

export function createErrorHandler(exposeMessages: boolean) {
  return function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
    if (err instanceof AppError && err.isOperational) {
      logger.warn('Request rejected', { error: err.message, status: err.statusCode, path: req.path, method: req.method });
      return res.status(err.statusCode).json({ success: false, error: err.message });
    }

    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });

    if (err instanceof ServiceError) {
      return res.status(503).json({ success: false, error: 'Service temporarily unavailable' });
    }

    if (err instanceof AppError) {
      return res.status(err.statusCode).json({ success: false, error: err.message });
    }

    res.status(500).json({
      success: false,
      error: exposeMessages ? err.message : 'Internal server error',
    });
  };
}
