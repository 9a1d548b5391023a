import { describe, it, expect } from 'vitest';
import { isFallbackData, validateForecastDataset } from '../forecast.validator.js';
import type { ForecastDataset } from '../forecast.types.js';

const valid: ForecastDataset = {
  columns: ['timestamp', 'product', 'point_forecast'],
  rows: [{ timestamp: '2023-11-20T00:00:00', product: 'DALMP', point_forecast: 25.5 }],
};

describe('validateForecastDataset', () => {
  it('accepts a dataset with rows and required columns', () => {
    expect(validateForecastDataset(valid)).toEqual({ isValid: true, errors: {} });
  });

  it('flags an empty dataset', () => {
    const result = validateForecastDataset({ columns: valid.columns, rows: [] });
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual({ empty: 'Dataset has no rows' });
  });

  it('lists missing required columns', () => {
    const result = validateForecastDataset({
      columns: ['timestamp'],
      rows: [{ timestamp: '2023-11-20T00:00:00' }],
    });
    expect(result.isValid).toBe(false);
    expect(result.errors.missingColumns).toEqual(['product', 'point_forecast']);
    expect(result.errors.empty).toBeUndefined();
  });

  it('reports both problems for null input without throwing', () => {
    const result = validateForecastDataset(null);
    expect(result.isValid).toBe(false);
    expect(result.errors.empty).toBe('Dataset has no rows');
    expect(result.errors.missingColumns).toEqual(['timestamp', 'product', 'point_forecast']);
  });
});

describe('isFallbackData', () => {
  it('is false without an is_fallback column', () => {
    expect(isFallbackData(valid)).toBe(false);
  });

  it('is false for null', () => {
    expect(isFallbackData(undefined)).toBe(false);
  });

  it('is true when any row is flagged', () => {
    const dataset: ForecastDataset = {
      columns: [...valid.columns, 'is_fallback'],
      rows: [
        { ...valid.rows[0], is_fallback: false },
        { ...valid.rows[0], is_fallback: true },
      ],
    };
    expect(isFallbackData(dataset)).toBe(true);
  });

  it('reads numeric and string flags', () => {
    const make = (flag: string | number): ForecastDataset => ({
      columns: ['is_fallback'],
      rows: [{ is_fallback: flag }],
    });
    expect(isFallbackData(make(1))).toBe(true);
    expect(isFallbackData(make(0))).toBe(false);
    expect(isFallbackData(make('True'))).toBe(true);
    expect(isFallbackData(make('false'))).toBe(false);
  });
});
