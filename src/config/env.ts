import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

/**
 * Positive integer read from a string variable
 */
const intVar = (fallback: string, min: number, max: number, message: string) =>
  z
    .string()
    .default(fallback)
    .transform(value => Number(value))
    .pipe(z.number().int().min(min, message).max(max, message));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intVar('8000', 1, 65535, 'PORT must be a valid port number'),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  BODY_LIMIT: z
    .string()
    .regex(/^\d+(b|kb|mb|gb)?$/i, 'BODY_LIMIT must look like 50mb')
    .default('50mb'),
  RATE_LIMIT_WINDOW_MS: intVar('900000', 1000, 86_400_000, 'RATE_LIMIT_WINDOW_MS must be within 1s-24h'),
  RATE_LIMIT_MAX: intVar('100', 1, 100_000, 'RATE_LIMIT_MAX must be within 1-100000'),
  PNG_MAX_CHUNK_BYTES: intVar(
    String(64 * 1024 * 1024),
    1,
    0x7fffffff,
    'PNG_MAX_CHUNK_BYTES must be within 1 and 2^31-1'
  ),
  PNG_MAX_INFLATED_BYTES: intVar(
    String(16 * 1024 * 1024),
    1,
    0x7fffffff,
    'PNG_MAX_INFLATED_BYTES must be within 1 and 2^31-1'
  ),
  TIFF_MAX_IFD_ENTRIES: intVar('4096', 1, 65535, 'TIFF_MAX_IFD_ENTRIES must be within 1-65535'),
  XMP_MAX_PACKET_BYTES: intVar(
    String(1024 * 1024),
    1,
    0x7fffffff,
    'XMP_MAX_PACKET_BYTES must be within 1 and 2^31-1'
  )
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
