import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { componentLogger } from '../config/logger';

const log = componentLogger('http');

function levelFor(statusCode: number): 'error' | 'warn' | 'info' {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}

/**
 * Tags each request with an id (echoed as X-Request-Id) and logs the
 * completed response, at warn for 4xx and error for 5xx.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.get('x-request-id') ?? randomUUID();
  const startedAt = process.hrtime.bigint();
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    log.log(levelFor(res.statusCode), `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      durationMs: Math.round(elapsedMs),
    });
  });

  next();
};
