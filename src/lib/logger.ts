import { pino, stdSerializers, type Logger } from 'pino';

import { env } from '../config/index.js';

// Image payloads are large and may carry personal data
const redactPaths: string[] = [
  'image_base64',
  '*.image_base64',
  'body.image_base64',
  'headers.authorization',
  'headers.cookie'
];

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: true
      }
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: {
    app: 'image-metadata-codec',
    env: env.NODE_ENV
  },
  serializers: {
    err: stdSerializers.err
  },
  transport,
  redact: {
    paths: redactPaths,
    remove: true
  }
});

/**
 * Child logger tagged with the subsystem it reports for
 */
export function componentLogger(component: 'http' | 'metadata' | 'server'): Logger {
  return logger.child({ component });
}
