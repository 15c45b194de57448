import cors from 'cors';
import express, { json, type Express } from 'express';
import helmet from 'helmet';

import { env } from '../config/index.js';
import { healthHandler } from './handlers/health.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { apiRateLimiter } from './middleware/rate-limit.js';
import { requestLogger } from './middleware/request-logger.js';
import { routes } from './routes/index.js';

/**
 * Create and configure Express application
 */
export function createApp(): Express {
  const app = express();

  // Trust proxy (for rate limiting behind reverse proxy)
  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  // Every request gets an id before anything can reject it
  app.use(requestLogger);

  app.use(helmet());
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
      exposedHeaders: ['X-Request-Id']
    })
  );

  app.get('/health', healthHandler);

  // Images arrive base64-encoded in JSON, so the body limit bounds the image size
  app.use('/api', apiRateLimiter, json({ limit: env.BODY_LIMIT }), routes);

  app.use(notFoundHandler);

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
