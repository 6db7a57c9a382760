/**
 * ENV: process configuration
 *
 * Validated once at startup. `.env` is loaded by dotenv before parsing.
 */

import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8002),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().min(1).default('*'),

  // Learned impact model (optional HTTP service)
  LEARNED_MODEL_ENABLED: booleanFlag,
  LEARNED_MODEL_URL: z.string().url().default('http://127.0.0.1:8015'),
  LEARNED_MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Forecast
  FORECAST_HORIZON_DAYS: z.coerce.number().int().min(1).max(90).default(7),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const details = Object.entries(result.error.flatten().fieldErrors)
      .map(([key, errors]) => `${key}: ${(errors ?? []).join(', ')}`)
      .join('; ');
    console.error(`[Config] Environment validation failed: ${details}`);
    throw new Error(`Invalid environment: ${details}`);
  }

  return result.data;
}

export const env = loadEnv();
