/**
 * FORECAST DATA: Types
 */

export type CellValue = string | number | boolean | null;

export type ForecastRow = Record<string, CellValue>;

/**
 * Tabular forecast data. `columns` holds every column name in first-seen order;
 * a row may omit a column, which reads as missing rather than null.
 */
export interface ForecastDataset {
  columns: string[];
  rows: ForecastRow[];
}

export type DateInput = string | Date;

export type ResponseFormat = 'json' | 'csv' | 'excel' | 'parquet';

export const REQUIRED_COLUMNS = ['timestamp', 'product', 'point_forecast'] as const;

export const SAMPLE_COLUMN_PREFIX = 'sample_';

export const DEFAULT_PERCENTILES: readonly [number, number] = [10, 90];

export interface ValidationErrors {
  empty?: string;
  missingColumns?: string[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationErrors;
}

export interface CacheEntry {
  key: string;
  dataset: ForecastDataset;
  createdAt: number; // ms epoch
  timeoutSeconds: number | null; // null → cache default
  product: string;
  rowCount: number;
}

export interface CacheStatistics {
  entryCount: number;
  totalRows: number;
  expiredCount: number;
  hitCount: number;
  missCount: number;
  hitRate: number; // percent, 0..100
  products: Record<string, number>;
}

export interface ForecastSuccess {
  ok: true;
  product: string;
  fromCache: boolean;
  isFallback: boolean;
  unit: string;
  percentiles: [number, number];
  data: ForecastDataset;
}

export type ForecastErrorKind =
  | 'connection'
  | 'timeout'
  | 'not_found'
  | 'invalid_product'
  | 'http_status'
  | 'parse'
  | 'unknown';

export interface ForecastErrorPayload {
  ok: false;
  errorId: string;
  type: 'data_loading';
  title: string;
  kind: ForecastErrorKind;
  message: string;
  context: string;
  timestamp: string;
  details?: string;
}

export type ForecastResult = ForecastSuccess | ForecastErrorPayload;

export function datasetFromRecords(records: ForecastRow[]): ForecastDataset {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of records) {
    for (const col of Object.keys(row)) {
      if (!seen.has(col)) {
        seen.add(col);
        columns.push(col);
      }
    }
  }
  return { columns, rows: records };
}

export function emptyDataset(): ForecastDataset {
  return { columns: [], rows: [] };
}
