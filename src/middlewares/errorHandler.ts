import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '../utils/errors';
import { HttpError } from '../utils/httpError';
import logger from '../utils/logger';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error('Error caught by middleware:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    method: req.method,
    path: req.path,
    requestId: req.requestId ?? null,
  });

  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.code, message: err.message, details: err.details ?? null });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({ error: err.message, details: err.details });
    return;
  }

  // non-operational errors are defects; their message stays in the logs
  if (err instanceof AppError && err.isOperational) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  res.status(500).json({ error: 'Internal Server Error' });
}
