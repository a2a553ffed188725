/**
 * Environment Configuration
 *
 * process.env is parsed once at import time. Anything missing falls back
 * to a development default; anything malformed fails the boot.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  STORAGE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  MONGO_DB: z.string().default('calculations'),

  JWT_SECRET: z.string().min(1).default('dev-secret-change-me'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${details}`);
  }

  if (parsed.data.NODE_ENV === 'production' && source.JWT_SECRET === undefined) {
    throw new Error('[Config] JWT_SECRET must be set in production');
  }

  return Object.freeze(parsed.data);
}

export const env: Env = loadEnv();
