/**
 * FORECAST SERVICE
 * ================
 *
 * Single entry point the dashboard uses for forecast data.
 *
 * Flow for every fetch operation:
 *   cache key → cache.get → hit: transform → return
 *                         → miss: client fetch → transform → cache.set(raw) → return
 *
 * Datasets that fail validation are still served (with a warning); the cache
 * refuses to store them. Any error is logged with its request context and
 * comes back as a ForecastErrorPayload, never as a rejection.
 */

import type { ForecastClient } from '../../clients/forecast.client.js';
import {
  ForecastConnectionError,
  ForecastHttpStatusError,
  ForecastParseError,
  ForecastTimeoutError,
  InvalidProductError,
  formatException,
} from '../../common/errors.js';
import { ErrorReporter } from '../../common/error-reporter.js';
import type { Clock, Logger } from '../../common/logger.js';
import { createConsoleLogger, defaultClock } from '../../common/logger.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';
import { cacheForecastCall } from './forecast.cache-adapter.js';
import type { CachedCall } from './forecast.cache-adapter.js';
import type { ForecastCache } from './forecast.cache.js';
import { generateForecastCacheKey } from './forecast.cache-key.js';
import type { CacheKeyParams } from './forecast.cache-key.js';
import { toIsoDate } from './forecast.dates.js';
import { DEFAULT_FORMAT } from './forecast.parser.js';
import { getProductUnit } from './forecast.products.js';
import { resolvePercentiles, transformForVisualization } from './forecast.transform.js';
import type { VisualizationDataset } from './forecast.transform.js';
import type {
  CacheStatistics,
  DateInput,
  ForecastDataset,
  ForecastErrorKind,
  ForecastErrorPayload,
  ForecastResult,
} from './forecast.types.js';
import { isFallbackData, validateForecastDataset } from './forecast.validator.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type ForecastApi = Pick<
  ForecastClient,
  'getForecastByDate' | 'getLatestForecast' | 'getForecastsByDateRange' | 'checkApiHealth' | 'close'
>;

export interface FetchOptions {
  percentiles?: readonly number[] | null;
  useCache?: boolean;
}

export interface ForecastServiceConfig {
  client: ForecastApi;
  cache: ForecastCache;
  errorReporter?: ErrorReporter;
  format?: string;
  debug?: boolean;
  logger?: Logger;
  clock?: Clock;
}

interface RequestContext {
  operation: 'getForecastByDate' | 'getLatestForecast' | 'getForecastRange';
  product: string;
  date?: string;
  startDate?: string;
  endDate?: string;
}

interface Route<A extends unknown[]> {
  fetch: (...args: A) => Promise<ForecastDataset>;
  cached: CachedCall<A>;
}

export const LATEST_MARKER = 'latest';

const ERROR_TITLE = 'Data Loading Error';

const MESSAGES = {
  connection:
    'Could not connect to the forecast data source. Please check your network connection and try again.',
  timeout: 'The forecast request timed out. Please try again later.',
  notFound: 'The requested forecast data could not be found. It may not be available yet.',
  generic: 'An error occurred while loading forecast data.',
} as const;

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class ForecastService {
  private readonly client: ForecastApi;
  private readonly cache: ForecastCache;
  private readonly errorReporter: ErrorReporter;
  private readonly format: string;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly inflight = new RequestCoalescer<ForecastDataset>();
  private closed = false;

  private readonly byDate: Route<[string, DateInput]>;
  private readonly latest: Route<[string]>;
  private readonly range: Route<[string, DateInput, DateInput]>;

  constructor(config: ForecastServiceConfig) {
    this.client = config.client;
    this.cache = config.cache;
    this.format = config.format ?? DEFAULT_FORMAT;
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? createConsoleLogger('ForecastService');
    this.clock = config.clock ?? defaultClock;
    this.errorReporter = config.errorReporter ?? new ErrorReporter({ logger: this.logger, clock: this.clock });

    this.byDate = this.route(
      (product, date) => this.cacheKey(product, { startDate: date }),
      (product, date) => this.client.getForecastByDate(product, date, this.format)
    );
    this.latest = this.route(
      product => this.cacheKey(product, { startDate: LATEST_MARKER }),
      product => this.client.getLatestForecast(product, this.format)
    );
    this.range = this.route(
      (product, startDate, endDate) => this.cacheKey(product, { startDate, endDate }),
      (product, startDate, endDate) =>
        this.client.getForecastsByDateRange(product, startDate, endDate, this.format)
    );

    this.logger.info({ format: this.format, cacheEnabled: this.cache.enabled }, 'Initialized ForecastService');
  }

  // ═══════════════════════════════════════════════════════════════
  // FETCH OPERATIONS
  // ═══════════════════════════════════════════════════════════════

  async getForecastByDate(
    product: string,
    date: DateInput,
    options: FetchOptions = {}
  ): Promise<ForecastResult> {
    const ctx: RequestContext = { operation: 'getForecastByDate', product, date: toIsoDate(date) };
    return this.load(this.byDate, [product, date], ctx, options);
  }

  async getLatestForecast(product: string, options: FetchOptions = {}): Promise<ForecastResult> {
    const ctx: RequestContext = { operation: 'getLatestForecast', product };
    return this.load(this.latest, [product], ctx, options);
  }

  async getForecastRange(
    product: string,
    startDate: DateInput,
    endDate: DateInput,
    options: FetchOptions = {}
  ): Promise<ForecastResult> {
    const ctx: RequestContext = {
      operation: 'getForecastRange',
      product,
      startDate: toIsoDate(startDate),
      endDate: toIsoDate(endDate),
    };
    return this.load(this.range, [product, startDate, endDate], ctx, options);
  }

  /**
   * Validate (warn only), compute percentile bands, attach units
   */
  processForecastData(dataset: ForecastDataset, percentiles?: readonly number[] | null): VisualizationDataset {
    const { isValid, errors } = validateForecastDataset(dataset);
    if (!isValid) {
      this.logger.warn({ errors }, 'Invalid forecast dataset, serving anyway');
    }
    return transformForVisualization(dataset, percentiles, this.logger);
  }

  isUsingFallback(dataset: ForecastDataset | null | undefined): boolean {
    return isFallbackData(dataset);
  }

  // ═══════════════════════════════════════════════════════════════
  // ADMINISTRATION
  // ═══════════════════════════════════════════════════════════════

  async checkApiHealth(): Promise<boolean> {
    try {
      return await this.client.checkApiHealth();
    } catch (error) {
      this.logger.error({ err: error }, 'API health check failed');
      return false;
    }
  }

  clearCache(product?: string | null): number {
    const count = this.cache.clear(product);
    this.logger.info({ product: product ?? 'all', count }, 'Cleared forecast cache');
    return count;
  }

  getCacheStats(): CacheStatistics {
    return this.cache.getStats();
  }

  getErrorReporter(): ErrorReporter {
    return this.errorReporter;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.close();
    this.logger.info({}, 'Closed forecast client connection');
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private cacheKey(product: string, params: CacheKeyParams): string {
    return generateForecastCacheKey(product, { ...params, format: this.format });
  }

  /**
   * Concurrent identical fetches share one client call; the cached variant
   * goes through the caching adapter.
   */
  private route<A extends unknown[]>(
    keyOf: (...args: A) => string,
    fetchRaw: (...args: A) => Promise<ForecastDataset>
  ): Route<A> {
    const fetch = (...args: A) => this.inflight.run(keyOf(...args), () => fetchRaw(...args));
    return { fetch, cached: cacheForecastCall(this.cache, keyOf, fetch) };
  }

  private async load<A extends unknown[]>(
    route: Route<A>,
    args: A,
    ctx: RequestContext,
    options: FetchOptions
  ): Promise<ForecastResult> {
    try {
      this.logger.info(ctx, 'Retrieving forecast');
      const percentiles = resolvePercentiles(options.percentiles);
      const prepare = (dataset: ForecastDataset) => this.processForecastData(dataset, percentiles);
      const useCache = (options.useCache ?? true) && this.cache.enabled;

      let data: VisualizationDataset;
      let fromCache = false;
      if (useCache) {
        const result = await route.cached(args, prepare);
        data = result.value;
        fromCache = result.fromCache;
        if (fromCache) this.logger.info(ctx, 'Using cached forecast');
      } else {
        data = prepare(await route.fetch(...args));
      }

      return {
        ok: true,
        product: ctx.product,
        fromCache,
        isFallback: isFallbackData(data),
        unit: getProductUnit(ctx.product),
        percentiles: data.percentiles,
        data: { columns: data.columns, rows: data.rows },
      };
    } catch (error) {
      return this.toErrorPayload(error, ctx);
    }
  }

  private toErrorPayload(error: unknown, ctx: RequestContext): ForecastErrorPayload {
    const context = describeContext(ctx);
    this.logger.error({ ...ctx, err: error }, `Error in ${ctx.operation}: ${formatException(error)}`);
    const errorId = this.errorReporter.report(error, context);

    const { kind, message } = this.classify(error);
    const payload: ForecastErrorPayload = {
      ok: false,
      errorId,
      type: 'data_loading',
      title: ERROR_TITLE,
      kind,
      message,
      context,
      timestamp: new Date(this.clock.now()).toISOString(),
    };

    if (this.debug) {
      let details = `Context: ${context}\nError: ${formatException(error)}`;
      if (error instanceof Error && error.stack) {
        details += `\n\nTraceback:\n${error.stack}`;
      }
      payload.details = details;
    }

    return payload;
  }

  private classify(error: unknown): { kind: ForecastErrorKind; message: string } {
    if (error instanceof InvalidProductError) {
      return { kind: 'invalid_product', message: error.message };
    }
    if (error instanceof ForecastConnectionError) {
      return { kind: 'connection', message: MESSAGES.connection };
    }
    if (error instanceof ForecastTimeoutError) {
      return { kind: 'timeout', message: MESSAGES.timeout };
    }
    if (error instanceof ForecastHttpStatusError && error.status === 404) {
      return { kind: 'not_found', message: MESSAGES.notFound };
    }

    const kind: ForecastErrorKind =
      error instanceof ForecastHttpStatusError ? 'http_status'
        : error instanceof ForecastParseError ? 'parse'
          : 'unknown';
    const reason = error instanceof Error ? error.message : String(error);
    return {
      kind,
      message: `${MESSAGES.generic} ${this.debug ? reason : 'Please try again later.'}`,
    };
  }
}

function describeContext(ctx: RequestContext): string {
  switch (ctx.operation) {
    case 'getForecastByDate':
      return `product=${ctx.product}, date=${ctx.date}`;
    case 'getLatestForecast':
      return `product=${ctx.product}, latest=true`;
    case 'getForecastRange':
      return `product=${ctx.product}, date_range=${ctx.startDate} to ${ctx.endDate}`;
  }
}
