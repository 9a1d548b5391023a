import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { env as defaultEnv } from './config/env.js';
import type { AppEnv } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerForecastDataModule } from './modules/forecast-data/index.js';
import type { ForecastApi } from './modules/forecast-data/index.js';

export interface BuildAppOptions {
  env?: AppEnv;
  /** Replaces the HTTP forecast client */
  client?: ForecastApi;
  logger?: FastifyServerOptions['logger'];
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.env ?? defaultEnv;

  const app = Fastify({
    logger: options.logger ?? { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

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
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
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
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerForecastDataModule(fastify, { env, client: options.client });
  });

  return app;
}
