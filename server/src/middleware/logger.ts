import type { Request, Response, NextFunction } from 'express';
import winston from 'winston';
import env from '../utils/env';

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
  defaultMeta: { service: 'interview-invites' },
  transports: [new winston.transports.Console({ silent: env.NODE_ENV === 'test' })]
});

export default function loggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.info('http_request', {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });
  next();
}
