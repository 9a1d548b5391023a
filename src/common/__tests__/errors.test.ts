import { describe, it, expect } from 'vitest';
import {
  AppError,
  ForecastHttpStatusError,
  ForecastParseError,
  ForecastTimeoutError,
  InvalidProductError,
  formatException,
} from '../errors.js';

describe('errors', () => {
  it('InvalidProductError lists the valid products', () => {
    const err = new InvalidProductError('FOO', ['DALMP', 'RTLMP']);
    expect(err).toBeInstanceOf(AppError);
    expect(err.message).toBe('Invalid product: FOO. Must be one of: DALMP, RTLMP');
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe('INVALID_PRODUCT');
  });

  it('ForecastHttpStatusError truncates long bodies', () => {
    const err = new ForecastHttpStatusError(500, 'x'.repeat(600));
    expect(err.bodyExcerpt).toBe(`${'x'.repeat(500)}...`);
    expect(err.message).toBe(`API request failed with status code: 500. Response: ${'x'.repeat(500)}...`);
    expect(err.statusCode).toBe(502);
  });

  it('ForecastHttpStatusError keeps 404 as 404', () => {
    expect(new ForecastHttpStatusError(404, 'missing').statusCode).toBe(404);
  });

  it('ForecastParseError carries its cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const err = new ForecastParseError('json', cause);
    expect(err.message).toBe('Failed to parse json response: Unexpected token');
    expect(err.cause).toBe(cause);
  });

  it('ForecastTimeoutError names the timeout', () => {
    expect(new ForecastTimeoutError(30_000).message).toBe('Forecast API request timed out after 30000ms');
  });

  it('formatException prefixes the error name', () => {
    expect(formatException(new RangeError('out'))).toBe('RangeError: out');
    expect(formatException(7)).toBe('UnknownError: 7');
  });
});
