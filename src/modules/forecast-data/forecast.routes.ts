/**
 * FORECAST DATA ROUTES: HTTP Endpoints
 *
 * Thin JSON surface over ForecastService for the dashboard.
 * Error payloads from the service are sent with a matching status;
 * query strings are checked with zod and fail as AppError('VALIDATION_ERROR').
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppError, InvalidProductError } from '../../common/errors.js';
import { PRODUCTS, isValidProduct, listProducts } from './forecast.products.js';
import type { ForecastService } from './forecast.service.js';
import { resolvePercentiles } from './forecast.transform.js';
import type { ForecastErrorKind, ForecastResult } from './forecast.types.js';

export const FORECAST_ROUTE_PREFIX = '/api/forecast';

interface ProductParams {
  product: string;
}

export interface ForecastRoutesDeps {
  service: ForecastService;
}

// ═══════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════

/**
 * "10,90" → [10, 90]; empty → undefined (service default)
 */
export function parsePercentiles(raw: string | undefined): [number, number] | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const values = raw.split(',').map(part => Number(part.trim()));
  if (values.some(v => !Number.isFinite(v))) {
    throw new Error(`Malformed percentiles: ${raw}`);
  }
  return resolvePercentiles(values);
}

const percentilesParam = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    try {
      return parsePercentiles(raw);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const useCacheParam = z
  .string()
  .optional()
  .transform(raw => raw === undefined || !['false', '0', 'no'].includes(raw.trim().toLowerCase()));

const requiredParam = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const fetchOptions = {
  percentiles: percentilesParam,
  useCache: useCacheParam,
};

const byDateQuery = z.object({ date: requiredParam('date'), ...fetchOptions });
const latestQuery = z.object(fetchOptions);
const rangeQuery = z.object({ start: requiredParam('start'), end: requiredParam('end'), ...fetchOptions });
const clearCacheQuery = z.object({ product: z.string().optional() });

function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new AppError(result.error.issues.map(issue => issue.message).join('; '), 'VALIDATION_ERROR', 400);
  }
  return result.data;
}

const STATUS_BY_KIND: Partial<Record<ForecastErrorKind, number>> = {
  invalid_product: 400,
  not_found: 404,
};

function sendResult(reply: FastifyReply, result: ForecastResult) {
  if (result.ok) {
    return reply.send(result);
  }
  return reply.status(STATUS_BY_KIND[result.kind] ?? 502).send(result);
}

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerForecastRoutes(
  app: FastifyInstance,
  deps: ForecastRoutesDeps
): Promise<void> {
  const { service } = deps;
  const prefix = FORECAST_ROUTE_PREFIX;

  /**
   * GET /api/forecast/health
   *
   * Reachability of the backend forecast API
   */
  app.get(`${prefix}/health`, async () => {
    const apiHealthy = await service.checkApiHealth();
    return { ok: true, data: { apiHealthy } };
  });

  /**
   * GET /api/forecast/products
   */
  app.get(`${prefix}/products`, async () => {
    return { ok: true, data: listProducts() };
  });

  /**
   * GET /api/forecast/cache/stats
   */
  app.get(`${prefix}/cache/stats`, async () => {
    return { ok: true, data: service.getCacheStats() };
  });

  /**
   * DELETE /api/forecast/cache?product=
   *
   * Without product: clears everything and resets counters
   */
  app.delete(`${prefix}/cache`, async (request: FastifyRequest) => {
    const { product } = parseQuery(clearCacheQuery, request.query);
    if (product !== undefined && !isValidProduct(product)) {
      throw new InvalidProductError(product, PRODUCTS);
    }
    const cleared = service.clearCache(product);
    return { ok: true, data: { cleared, product: product ?? null } };
  });

  /**
   * GET /api/forecast/errors
   *
   * Recent error reports, newest first
   */
  app.get(`${prefix}/errors`, async () => {
    const reporter = service.getErrorReporter();
    return { ok: true, data: { count: reporter.count(), errors: reporter.summary() } };
  });

  /**
   * GET /api/forecast/:product?date=YYYY-MM-DD
   */
  app.get(`${prefix}/:product`, async (
    request: FastifyRequest<{ Params: ProductParams }>,
    reply: FastifyReply
  ) => {
    const { date, ...options } = parseQuery(byDateQuery, request.query);
    const result = await service.getForecastByDate(request.params.product, date, options);
    return sendResult(reply, result);
  });

  /**
   * GET /api/forecast/:product/latest
   */
  app.get(`${prefix}/:product/latest`, async (
    request: FastifyRequest<{ Params: ProductParams }>,
    reply: FastifyReply
  ) => {
    const options = parseQuery(latestQuery, request.query);
    const result = await service.getLatestForecast(request.params.product, options);
    return sendResult(reply, result);
  });

  /**
   * GET /api/forecast/:product/range?start=&end=
   */
  app.get(`${prefix}/:product/range`, async (
    request: FastifyRequest<{ Params: ProductParams }>,
    reply: FastifyReply
  ) => {
    const { start, end, ...options } = parseQuery(rangeQuery, request.query);
    const result = await service.getForecastRange(request.params.product, start, end, options);
    return sendResult(reply, result);
  });

  app.log.info(`[Forecast] Routes registered at ${prefix}/*`);
}
