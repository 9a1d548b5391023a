/**
 * FORECAST DATA: Cache key generator
 *
 * md5 over `product=..:date=..:end_date=..:format=..`. Absent optional parts
 * are left out of the input string entirely, so omitting a field and passing
 * an empty value produce different keys.
 */

import { createHash } from 'crypto';
import { toIsoDate } from './forecast.dates.js';
import type { DateInput } from './forecast.types.js';

export interface CacheKeyParams {
  startDate?: DateInput | null;
  endDate?: DateInput | null;
  format?: string | null;
}

export function buildCacheKeyInput(product: string, params: CacheKeyParams = {}): string {
  const parts = [`product=${product}`];
  if (params.startDate != null) parts.push(`date=${toIsoDate(params.startDate)}`);
  if (params.endDate != null) parts.push(`end_date=${toIsoDate(params.endDate)}`);
  if (params.format != null) parts.push(`format=${params.format}`);
  return parts.join(':');
}

export function generateForecastCacheKey(product: string, params: CacheKeyParams = {}): string {
  return createHash('md5').update(buildCacheKeyInput(product, params)).digest('hex');
}
