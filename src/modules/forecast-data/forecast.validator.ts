/**
 * FORECAST DATA: Validator
 *
 * Minimal schema check. Never throws; callers decide what an invalid
 * dataset means for them.
 */

import type { ForecastDataset, ValidationErrors, ValidationResult } from './forecast.types.js';
import { REQUIRED_COLUMNS } from './forecast.types.js';

export function validateForecastDataset(dataset: ForecastDataset | null | undefined): ValidationResult {
  const errors: ValidationErrors = {};

  if (!dataset || dataset.rows.length === 0) {
    errors.empty = 'Dataset has no rows';
  }

  const columns = new Set(dataset?.columns ?? []);
  const missing = REQUIRED_COLUMNS.filter(col => !columns.has(col));
  if (missing.length > 0) {
    errors.missingColumns = missing;
  }

  return {
    isValid: Object.keys(errors).length === 0,
    errors,
  };
}

/**
 * True when any row is flagged as fallback data.
 * A missing flag column or an empty dataset simply means "not fallback".
 */
export function isFallbackData(dataset: ForecastDataset | null | undefined): boolean {
  if (!dataset || !dataset.columns.includes('is_fallback')) return false;
  return dataset.rows.some(row => isTruthyFlag(row.is_fallback));
}

function isTruthyFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', '1', 't', 'yes'].includes(value.trim().toLowerCase());
  return false;
}
