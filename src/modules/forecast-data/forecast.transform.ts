/**
 * FORECAST DATA: Visualization transform
 *
 * Turns a raw backend dataset into chart-ready rows:
 *   timestamp, product, point_forecast, lower_bound, upper_bound, is_fallback, unit
 *
 * Bands come from the `sample_*` columns when the backend ships the
 * probabilistic samples, otherwise from bounds already present.
 */

import type { Logger } from '../../common/logger.js';
import { getProductUnit } from './forecast.products.js';
import { parseBusinessTimestamp, toBusinessTimestamp } from './forecast.dates.js';
import type { CellValue, ForecastDataset, ForecastRow } from './forecast.types.js';
import { DEFAULT_PERCENTILES, SAMPLE_COLUMN_PREFIX } from './forecast.types.js';

export const VISUALIZATION_COLUMNS = [
  'timestamp',
  'product',
  'point_forecast',
  'lower_bound',
  'upper_bound',
  'is_fallback',
  'unit',
] as const;

export interface VisualizationDataset extends ForecastDataset {
  percentiles: [number, number];
}

/**
 * Percentile with linear interpolation between closest ranks.
 */
export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function resolvePercentiles(percentiles?: readonly number[] | null): [number, number] {
  const chosen = percentiles ?? DEFAULT_PERCENTILES;
  if (chosen.length !== 2) {
    throw new Error('Percentiles must be a list of exactly 2 values (lower, upper)');
  }
  const [lower, upper] = chosen;
  if (!(lower >= 0 && upper <= 100 && lower < upper)) {
    throw new Error(`Invalid percentiles [${lower}, ${upper}]: need 0 <= lower < upper <= 100`);
  }
  return [lower, upper];
}

export function getSampleColumns(dataset: ForecastDataset): string[] {
  return dataset.columns.filter(col => col.startsWith(SAMPLE_COLUMN_PREFIX));
}

function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

function toFlag(value: CellValue | undefined): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', '1', 't', 'yes'].includes(value.trim().toLowerCase());
  return false;
}

function timestampOrder(value: CellValue): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = parseBusinessTimestamp(value);
    if (parsed) return parsed.getTime();
  }
  return Number.POSITIVE_INFINITY;
}

export function prepareForVisualization(
  dataset: ForecastDataset,
  percentiles?: readonly number[] | null,
  logger?: Logger
): VisualizationDataset {
  const missing = ['timestamp', 'product', 'point_forecast'].filter(col => !dataset.columns.includes(col));
  if (missing.length > 0) {
    throw new Error(`Dataset missing required columns: ${missing.join(', ')}`);
  }

  const [lower, upper] = resolvePercentiles(percentiles);
  const sampleColumns = getSampleColumns(dataset);
  const hasBounds = dataset.columns.includes('lower_bound') && dataset.columns.includes('upper_bound');

  if (sampleColumns.length === 0 && !hasBounds) {
    logger?.warn(
      { columns: dataset.columns },
      'Dataset has neither sample columns nor uncertainty bounds, bands left empty'
    );
  }

  const rows: ForecastRow[] = dataset.rows.map(row => {
    let lowerBound: number | null;
    let upperBound: number | null;

    if (sampleColumns.length > 0) {
      const samples = sampleColumns
        .map(col => toNumber(row[col]))
        .filter((v): v is number => v !== null);
      lowerBound = percentile(samples, lower);
      upperBound = percentile(samples, upper);
    } else {
      lowerBound = toNumber(row.lower_bound);
      upperBound = toNumber(row.upper_bound);
    }

    const timestamp = row.timestamp;
    return {
      timestamp: typeof timestamp === 'string' || typeof timestamp === 'number'
        ? toBusinessTimestamp(timestamp)
        : timestamp ?? null,
      product: row.product ?? null,
      point_forecast: toNumber(row.point_forecast),
      lower_bound: lowerBound,
      upper_bound: upperBound,
      is_fallback: toFlag(row.is_fallback),
    };
  });

  rows.sort((a, b) => {
    const byTime = timestampOrder(a.timestamp) - timestampOrder(b.timestamp);
    if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
    return String(a.product).localeCompare(String(b.product));
  });

  return {
    columns: VISUALIZATION_COLUMNS.filter(col => col !== 'unit'),
    rows,
    percentiles: [lower, upper],
  };
}

export function addUnitInformation(dataset: VisualizationDataset): VisualizationDataset {
  return {
    ...dataset,
    columns: [...dataset.columns, 'unit'],
    rows: dataset.rows.map(row => ({ ...row, unit: getProductUnit(String(row.product)) })),
  };
}

/**
 * Full raw → chart-ready pipeline (bands + unit column).
 */
export function transformForVisualization(
  dataset: ForecastDataset,
  percentiles?: readonly number[] | null,
  logger?: Logger
): VisualizationDataset {
  return addUnitInformation(prepareForVisualization(dataset, percentiles, logger));
}
