import type { Server } from 'node:http';
import { pathToFileURL } from 'node:url';

import { createApp } from './app.js';
import { codecLimits, env } from '../config/index.js';
import { componentLogger } from '../lib/logger.js';

const log = componentLogger('server');

const SHUTDOWN_TIMEOUT_MS = 10_000;

/**
 * Start the metadata API and install signal handlers for a graceful stop
 */
function startServer(): Server {
  const app = createApp();

  const server = app.listen(env.PORT, env.HOST, () => {
    log.info(
      { port: env.PORT, host: env.HOST, bodyLimit: env.BODY_LIMIT, limits: codecLimits() },
      'Metadata API listening'
    );
  });

  server.on('error', error => {
    log.fatal({ err: error }, 'HTTP server failed');
    process.exit(1);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Shutting down');
    server.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });

    setTimeout(() => {
      log.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return server;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer();
}

export { startServer };
