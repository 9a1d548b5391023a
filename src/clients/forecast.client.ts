/**
 * Forecast API HTTP Client
 *
 * HTTP-only access to the backend forecast service:
 *
 *   GET {baseUrl}/forecasts/{product}?start_date=&end_date=&format=
 *   GET {baseUrl}/forecasts/{product}/latest
 *   GET {baseUrl}/health
 *
 * Transport failures surface as ForecastConnectionError / ForecastTimeoutError,
 * non-2xx answers as ForecastHttpStatusError, bad bodies as ForecastParseError.
 * Nothing is swallowed here; the service layer decides how to degrade.
 *
 * @example
 * const client = new ForecastClient({ baseUrl: 'http://localhost:8000/api' });
 * const dataset = await client.getForecastByDate('DALMP', '2023-11-20');
 */

import http from 'http';
import https from 'https';
import axios, { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import {
  ForecastClientClosedError,
  ForecastConnectionError,
  ForecastHttpStatusError,
  ForecastTimeoutError,
  InvalidProductError,
} from '../common/errors.js';
import type { Logger } from '../common/logger.js';
import { createConsoleLogger } from '../common/logger.js';
import { toIsoDate } from '../modules/forecast-data/forecast.dates.js';
import { DEFAULT_FORMAT, parseResponseBody } from '../modules/forecast-data/forecast.parser.js';
import { PRODUCTS } from '../modules/forecast-data/forecast.products.js';
import type { DateInput, ForecastDataset } from '../modules/forecast-data/forecast.types.js';

// ============================================
// CLIENT CONFIGURATION
// ============================================

export const USER_AGENT = 'ElectricityMarketForecastClient/1.0';

export interface ForecastClientConfig {
  baseUrl: string;
  timeoutMs: number;
  products: readonly string[];
  logger?: Logger;
  /** Custom axios adapter; replaces the network transport (used by tests) */
  adapter?: AxiosAdapter;
}

const DEFAULT_CONFIG: Omit<ForecastClientConfig, 'logger' | 'adapter'> = {
  baseUrl: 'http://localhost:8000/api',
  timeoutMs: 30_000,
  products: PRODUCTS,
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

// ============================================
// FORECAST CLIENT
// ============================================

export class ForecastClient {
  private client: AxiosInstance;
  private config: ForecastClientConfig;
  private logger: Logger;
  private httpAgent = new http.Agent({ keepAlive: true });
  private httpsAgent = new https.Agent({ keepAlive: true });
  private closed = false;

  constructor(config: Partial<ForecastClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = config.logger ?? createConsoleLogger('ForecastClient');

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      responseType: 'arraybuffer',
      // status handling happens in request(); axios must not throw on non-2xx
      validateStatus: () => true,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: this.config.adapter,
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
    });

    this.logger.info({ baseUrl: this.config.baseUrl }, 'Initialized ForecastClient');
  }

  // ============================================
  // FORECAST API
  // ============================================

  /**
   * Forecast for a single day (start_date = end_date)
   */
  async getForecastByDate(
    product: string,
    date: DateInput,
    format: string = DEFAULT_FORMAT
  ): Promise<ForecastDataset> {
    const validProduct = this.validateProduct(product);
    const day = toIsoDate(date);

    this.logger.info({ product, date: day, format }, 'Retrieving forecast');
    try {
      return await this.request(`/forecasts/${validProduct}`, format, {
        start_date: day,
        end_date: day,
        format,
      });
    } catch (error) {
      this.logger.error({ product, date: day, err: error }, 'Error retrieving forecast');
      throw error;
    }
  }

  /**
   * Most recently generated forecast
   */
  async getLatestForecast(product: string, format: string = DEFAULT_FORMAT): Promise<ForecastDataset> {
    const validProduct = this.validateProduct(product);

    this.logger.info({ product, format }, 'Retrieving latest forecast');
    try {
      return await this.request(`/forecasts/${validProduct}/latest`, format, { format });
    } catch (error) {
      this.logger.error({ product, err: error }, 'Error retrieving latest forecast');
      throw error;
    }
  }

  /**
   * Inclusive date range, served by the backend in one response
   */
  async getForecastsByDateRange(
    product: string,
    startDate: DateInput,
    endDate: DateInput,
    format: string = DEFAULT_FORMAT
  ): Promise<ForecastDataset> {
    const validProduct = this.validateProduct(product);
    const start = toIsoDate(startDate);
    const end = toIsoDate(endDate);

    this.logger.info({ product, startDate: start, endDate: end, format }, 'Retrieving forecast range');
    try {
      return await this.request(`/forecasts/${validProduct}`, format, {
        start_date: start,
        end_date: end,
        format,
      });
    } catch (error) {
      this.logger.error(
        { product, startDate: start, endDate: end, err: error },
        'Error retrieving forecast range'
      );
      throw error;
    }
  }

  // ============================================
  // HEALTH CHECK
  // ============================================

  /**
   * True only on HTTP 200. Never throws.
   */
  async checkApiHealth(): Promise<boolean> {
    if (this.closed) return false;
    try {
      this.logger.debug?.({ url: '/health' }, 'Checking API health');
      const response = await this.client.get<unknown>('/health');
      return response.status === 200;
    } catch (error) {
      this.logger.error({ err: error }, 'API health check failed');
      return false;
    }
  }

  /**
   * Release keep-alive sockets. Safe to call repeatedly, or before any request.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger.info({}, 'Closed ForecastClient session');
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private validateProduct(product: string): string {
    if (!this.config.products.includes(product)) {
      this.logger.error({ product }, 'Invalid product');
      throw new InvalidProductError(product, this.config.products);
    }
    return product;
  }

  private async request(
    path: string,
    format: string,
    params: Record<string, string>
  ): Promise<ForecastDataset> {
    if (this.closed) {
      throw new ForecastClientClosedError();
    }

    let status: number;
    let body: Buffer;
    try {
      const response = await this.client.get<unknown>(path, { params });
      status = response.status;
      body = toBuffer(response.data);
    } catch (error) {
      throw this.toTransportError(error);
    }

    if (status < 200 || status >= 300) {
      this.logger.error({ path, status }, 'API request failed');
      throw new ForecastHttpStatusError(status, body.toString('utf-8'));
    }

    return parseResponseBody(body, format, this.logger);
  }

  private toTransportError(error: unknown): Error {
    if (axios.isAxiosError(error)) {
      const code = error.code ?? '';
      if (code === AxiosError.ECONNABORTED || code === AxiosError.ETIMEDOUT || code === 'ETIMEDOUT') {
        return new ForecastTimeoutError(this.config.timeoutMs, error);
      }
      if (CONNECTION_ERROR_CODES.has(code) || !error.response) {
        return new ForecastConnectionError(
          `Could not connect to forecast API at ${this.config.baseUrl}: ${error.message}`,
          error
        );
      }
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  if (data === undefined || data === null) return Buffer.alloc(0);
  return Buffer.from(JSON.stringify(data), 'utf-8');
}
