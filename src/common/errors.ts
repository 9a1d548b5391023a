/**
 * Application errors
 *
 * AppError carries an HTTP status and a stable code; the Fastify error
 * handler in app.ts turns it into `{ ok: false, error, message }`.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidProductError extends AppError {
  public readonly product: string;

  constructor(product: string, validProducts: readonly string[]) {
    super(
      `Invalid product: ${product}. Must be one of: ${validProducts.join(', ')}`,
      'INVALID_PRODUCT',
      400
    );
    this.name = 'InvalidProductError';
    this.product = product;
  }
}

export class ForecastConnectionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'FORECAST_CONNECTION', 503, { cause });
    this.name = 'ForecastConnectionError';
  }
}

export class ForecastTimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, cause?: unknown) {
    super(`Forecast API request timed out after ${timeoutMs}ms`, 'FORECAST_TIMEOUT', 504, { cause });
    this.name = 'ForecastTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const BODY_EXCERPT_LIMIT = 500;

export class ForecastHttpStatusError extends AppError {
  public readonly status: number;
  public readonly bodyExcerpt: string;

  constructor(status: number, body: string) {
    const bodyExcerpt = body.length > BODY_EXCERPT_LIMIT
      ? `${body.slice(0, BODY_EXCERPT_LIMIT)}...`
      : body;
    super(
      `API request failed with status code: ${status}. Response: ${bodyExcerpt}`,
      'FORECAST_HTTP_STATUS',
      status === 404 ? 404 : 502
    );
    this.name = 'ForecastHttpStatusError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
  }
}

export class ForecastParseError extends AppError {
  constructor(format: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to parse ${format} response: ${reason}`, 'FORECAST_PARSE', 502, { cause });
    this.name = 'ForecastParseError';
  }
}

export class ForecastClientClosedError extends AppError {
  constructor() {
    super('Forecast client has been closed', 'FORECAST_CLIENT_CLOSED', 503);
    this.name = 'ForecastClientClosedError';
  }
}

export function formatException(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return `UnknownError: ${String(error)}`;
}
