/**
 * FORECAST DATA MODULE: Index
 *
 * Cache key, validation, caching, transform and service for forecast data,
 * plus the Fastify registration that wires them to a ForecastClient.
 */

import type { FastifyInstance } from 'fastify';
import { ForecastClient } from '../../clients/index.js';
import { ErrorReporter } from '../../common/error-reporter.js';
import { fromFastifyLogger } from '../../common/logger.js';
import type { AppEnv } from '../../config/env.js';
import { ForecastCache } from './forecast.cache.js';
import { registerForecastRoutes } from './forecast.routes.js';
import { ForecastService } from './forecast.service.js';
import type { ForecastApi } from './forecast.service.js';

export * from './forecast.types.js';
export * from './forecast.products.js';
export * from './forecast.dates.js';
export * from './forecast.cache-key.js';
export * from './forecast.validator.js';
export * from './forecast.parser.js';
export * from './forecast.transform.js';
export * from './forecast.cache.js';
export * from './forecast.cache-adapter.js';
export * from './forecast.service.js';
export * from './forecast.routes.js';

export type ForecastModuleEnv = Pick<
  AppEnv,
  | 'DEBUG'
  | 'FORECAST_API_BASE_URL'
  | 'FORECAST_API_TIMEOUT'
  | 'FORECAST_API_FORMAT'
  | 'CACHE_ENABLED'
  | 'CACHE_TIMEOUT'
  | 'ERROR_HISTORY_LIMIT'
>;

export interface ForecastModuleOptions {
  env: ForecastModuleEnv;
  /** Replaces the HTTP client; tests pass an in-process fake */
  client?: ForecastApi;
}

/**
 * Build client, cache, error registry and service from config,
 * register routes, and close the service with the app.
 */
export async function registerForecastDataModule(
  app: FastifyInstance,
  options: ForecastModuleOptions
): Promise<ForecastService> {
  const { env } = options;

  const client = options.client ?? new ForecastClient({
    baseUrl: env.FORECAST_API_BASE_URL,
    timeoutMs: env.FORECAST_API_TIMEOUT * 1000,
    logger: fromFastifyLogger(app.log, 'ForecastClient'),
  });

  const cache = new ForecastCache({
    enabled: env.CACHE_ENABLED,
    defaultTimeoutSeconds: env.CACHE_TIMEOUT,
    logger: fromFastifyLogger(app.log, 'ForecastCache'),
  });

  const errorReporter = new ErrorReporter({
    maxHistory: env.ERROR_HISTORY_LIMIT,
    logger: fromFastifyLogger(app.log, 'ErrorReporter'),
  });

  const service = new ForecastService({
    client,
    cache,
    errorReporter,
    format: env.FORECAST_API_FORMAT,
    debug: env.DEBUG,
    logger: fromFastifyLogger(app.log, 'ForecastService'),
  });

  app.addHook('onClose', async () => {
    service.close();
  });

  await registerForecastRoutes(app, { service });
  return service;
}
