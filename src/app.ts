import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import { env, type Env } from './config/env.js';
import { AppError, ValidationFailedError } from './common/errors.js';
import { zodPlugin } from './plugins/zod.js';
import type { Storage } from './db/storage.js';
import { authPlugin } from './modules/auth/auth.plugin.js';
import { createCalculationService, registerCalculationModule } from './modules/calculations/index.js';
import { createUserService, registerUserModule } from './modules/users/index.js';

export type AppConfig = Pick<
  Env,
  'NODE_ENV' | 'LOG_LEVEL' | 'CORS_ORIGINS' | 'JWT_SECRET' | 'ACCESS_TOKEN_EXPIRE_MINUTES' | 'REFRESH_TOKEN_EXPIRE_DAYS'
>;

export interface BuildAppOptions {
  storage: Storage;
  config?: Partial<AppConfig>;
}

/**
 * Build Fastify Application
 */
export function buildApp({ storage, config: overrides = {} }: BuildAppOptions): FastifyInstance {
  const config: AppConfig = { ...env, ...overrides };

  const app = Fastify({
    logger: config.LOG_LEVEL === 'silent' ? false : { level: config.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Plugins
  app.register(formbody);
  app.register(zodPlugin);

  const calculations = createCalculationService(app, storage.calculations);
  const users = createUserService(app, storage.users, calculations);

  app.register(authPlugin, {
    secret: config.JWT_SECRET,
    settings: {
      accessTokenMinutes: config.ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshTokenDays: config.REFRESH_TOKEN_EXPIRE_DAYS,
    },
    blacklist: storage.blacklist,
    users,
  });

  // Global error handler
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      if (err.isClientError) {
        req.log.info({ code: err.code, statusCode: err.statusCode }, err.message);
      } else {
        req.log.error(err);
      }

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err instanceof ValidationFailedError ? { issues: err.issues } : {}),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error(err);
    }

    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : err.code,
      message: statusCode >= 500 && config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerUserModule(fastify, users);
    await registerCalculationModule(fastify, calculations);
  });

  return app;
}
