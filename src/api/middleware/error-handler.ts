import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { env } from '../../config/index.js';
import { isMetadataError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  timestamp: string;
  path: string;
}

/**
 * Fallback for unmatched routes; registered after every router
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: 'Not Found',
    message: `No route for ${req.method} ${req.path}`,
    timestamp: new Date().toISOString(),
    path: req.path
  };
  res.status(404).json(response);
}

/**
 * Global error handling middleware
 * Must be registered last in the middleware chain
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const clientError = isMetadataError(err) || err instanceof ZodError;

  logger[clientError ? 'warn' : 'error'](
    {
      error: err.message,
      code: isMetadataError(err) ? err.code : undefined,
      stack: clientError ? undefined : err.stack,
      method: req.method,
      url: req.url
    },
    'Request error'
  );

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      error: 'Validation Error',
      message: 'Invalid request data',
      details: err.errors,
      timestamp: new Date().toISOString(),
      path: req.path
    };
    res.status(400).json(response);
    return;
  }

  // Codec failures carry the failing key and codec
  if (isMetadataError(err)) {
    const response: ErrorResponse = {
      error: err.code,
      message: err.message,
      timestamp: new Date().toISOString(),
      path: req.path
    };
    if (err.context.key !== undefined || err.context.codec !== undefined) {
      response.details = { ...err.context };
    }
    res.status(err.statusCode).json(response);
    return;
  }

  // Handle known application errors (body-parser sets status on oversized or malformed bodies)
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    const response: ErrorResponse = {
      error: err.name,
      message: err.message,
      timestamp: new Date().toISOString(),
      path: req.path
    };
    res.status(err.status).json(response);
    return;
  }

  // Handle unknown errors (don't leak details in production)
  const response: ErrorResponse = {
    error: 'Internal Server Error',
    message: env.isProduction ? 'An unexpected error occurred' : err.message,
    timestamp: new Date().toISOString(),
    path: req.path
  };

  res.status(500).json(response);
}
