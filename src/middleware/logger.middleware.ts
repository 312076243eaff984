import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { createComponentLogger } from '../config/logger';

const log = createComponentLogger('http');

export const REQUEST_ID_HEADER = 'x-request-id';

// Liveness probes would drown everything else
const QUIET_PATHS = new Set(['/health']);

function levelFor(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}

/**
 * Tags each request with an id (the caller's x-request-id when given), echoes
 * it on the response and logs the outcome with timing. Availability queries
 * are logged with their query string so slow slot scans can be traced.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  if (QUIET_PATHS.has(req.path)) {
    next();
    return;
  }

  const startTime = process.hrtime.bigint();
  const requestId = req.get(REQUEST_ID_HEADER) ?? randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  log.debug('Incoming request', {
    requestId,
    method: req.method,
    path: req.path,
    query: req.query,
    ip: req.ip,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;

    log.log(levelFor(res.statusCode), 'Request completed', {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs * 10) / 10,
    });
  });

  next();
};
