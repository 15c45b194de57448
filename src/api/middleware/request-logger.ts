import type { NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';
import { ulid } from 'ulid';

import { componentLogger } from '../../lib/logger.js';

const httpLog = componentLogger('http');

const requestLogs = new WeakMap<Response, Logger>();

/**
 * Logger bound to the request that `res` answers
 */
export function requestLog(res: Response): Logger {
  return requestLogs.get(res) ?? httpLog;
}

/**
 * Request logging middleware
 * Tags each request with a ULID, echoed in the X-Request-Id header
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = process.hrtime.bigint();
  const requestId = ulid();
  const log = httpLog.child({ requestId });

  requestLogs.set(res, log);
  res.setHeader('X-Request-Id', requestId);

  log.debug(
    {
      method: req.method,
      url: req.originalUrl,
      contentLength: req.get('content-length'),
      ip: req.ip
    },
    'Incoming request'
  );

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e6;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
    log[level](
      {
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        responseBytes: res.getHeader('content-length'),
        durationMs: Math.round(duration * 100) / 100
      },
      'Request completed'
    );
  });

  next();
}
