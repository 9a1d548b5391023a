import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { buildCacheKeyInput, generateForecastCacheKey } from '../forecast.cache-key.js';

describe('buildCacheKeyInput', () => {
  it('joins all present parts in fixed order', () => {
    expect(
      buildCacheKeyInput('DALMP', { startDate: '2023-11-20', endDate: '2023-11-22', format: 'json' })
    ).toBe('product=DALMP:date=2023-11-20:end_date=2023-11-22:format=json');
  });

  it('omits absent parts', () => {
    expect(buildCacheKeyInput('RTLMP')).toBe('product=RTLMP');
    expect(buildCacheKeyInput('RTLMP', { startDate: null, format: 'csv' })).toBe('product=RTLMP:format=csv');
  });

  it('passes non-date markers through', () => {
    expect(buildCacheKeyInput('DALMP', { startDate: 'latest', format: 'json' })).toBe(
      'product=DALMP:date=latest:format=json'
    );
  });
});

describe('generateForecastCacheKey', () => {
  it('is the md5 hex digest of the key input', () => {
    const expected = createHash('md5').update('product=DALMP:date=2023-11-20:format=json').digest('hex');
    expect(generateForecastCacheKey('DALMP', { startDate: '2023-11-20', format: 'json' })).toBe(expected);
    expect(expected).toMatch(/^[0-9a-f]{32}$/);
  });

  it('is deterministic across calls', () => {
    const a = generateForecastCacheKey('RegUp', { startDate: '2023-11-20' });
    const b = generateForecastCacheKey('RegUp', { startDate: '2023-11-20' });
    expect(a).toBe(b);
  });

  it('treats a Date and its calendar-day string the same', () => {
    const fromDate = generateForecastCacheKey('DALMP', { startDate: new Date('2023-11-20T12:00:00-06:00') });
    const fromString = generateForecastCacheKey('DALMP', { startDate: '2023-11-20' });
    expect(fromDate).toBe(fromString);
  });

  it('treats a date-only Date (UTC midnight) as its own calendar day', () => {
    const fromString = generateForecastCacheKey('DALMP', { startDate: '2023-11-20' });
    expect(generateForecastCacheKey('DALMP', { startDate: new Date('2023-11-20') })).toBe(fromString);
    expect(generateForecastCacheKey('DALMP', { startDate: new Date(Date.UTC(2023, 10, 20)) })).toBe(fromString);
  });

  it('differs when any part differs', () => {
    const base = generateForecastCacheKey('DALMP', { startDate: '2023-11-20', format: 'json' });
    expect(generateForecastCacheKey('RTLMP', { startDate: '2023-11-20', format: 'json' })).not.toBe(base);
    expect(generateForecastCacheKey('DALMP', { startDate: '2023-11-21', format: 'json' })).not.toBe(base);
    expect(generateForecastCacheKey('DALMP', { startDate: '2023-11-20', format: 'csv' })).not.toBe(base);
    expect(generateForecastCacheKey('DALMP', { startDate: '2023-11-20' })).not.toBe(base);
  });
});
