import type { Request, Response, NextFunction } from 'express';
import { logger } from './logger';
import { AppError, ValidationError } from '../utils/errors';

export default function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('unhandled_error', { message, stack: err instanceof Error ? err.stack : undefined, url: req.originalUrl });

  if (err instanceof AppError) {
    res.status(err.status).json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError && { field: err.field })
    });
    return;
  }
  // body-parser and other express middleware attach an http status to their errors
  const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
  res.status(status).json({ error: message || 'Internal server error' });
}
