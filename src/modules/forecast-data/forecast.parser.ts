/**
 * FORECAST DATA: Response body parser
 *
 * Format-dispatched decoding of backend payloads into a ForecastDataset.
 * Unknown formats fall back to JSON with a logged warning.
 */

import { parse as parseCsv } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { parquetReadObjects } from 'hyparquet';
import { ForecastParseError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { CellValue, ForecastDataset, ForecastRow, ResponseFormat } from './forecast.types.js';
import { datasetFromRecords } from './forecast.types.js';

export const SUPPORTED_FORMATS: readonly ResponseFormat[] = ['json', 'csv', 'excel', 'parquet'];

export const DEFAULT_FORMAT: ResponseFormat = 'json';

export function isSupportedFormat(format: string): format is ResponseFormat {
  return SUPPORTED_FORMATS.some(supported => supported === format);
}

/**
 * Coerce whatever a decoder produced into a cell value
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return JSON.stringify(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRow(record: Record<string, unknown>): ForecastRow {
  const row: ForecastRow = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = toCellValue(value);
  }
  return row;
}

/**
 * Accepts a list of records, or a column-oriented object of equal-length arrays
 */
export function recordsFromJson(payload: unknown): ForecastDataset {
  if (Array.isArray(payload)) {
    const rows = payload.map((item, i) => {
      if (!isPlainObject(item)) {
        throw new Error(`Record ${i} is not an object`);
      }
      return toRow(item);
    });
    return datasetFromRecords(rows);
  }

  if (isPlainObject(payload)) {
    const entries = Object.entries(payload);
    if (entries.length > 0 && entries.every(([, v]) => Array.isArray(v))) {
      const columns = entries.map(([k]) => k);
      const lengths = new Set(entries.map(([, v]) => (Array.isArray(v) ? v.length : 0)));
      if (lengths.size !== 1) {
        throw new Error('Column arrays have different lengths');
      }
      const [length] = lengths;
      const rows: ForecastRow[] = [];
      for (let i = 0; i < length; i++) {
        const row: ForecastRow = {};
        for (const [col, values] of entries) {
          row[col] = toCellValue(Array.isArray(values) ? values[i] : null);
        }
        rows.push(row);
      }
      return { columns, rows };
    }
  }

  throw new Error('Expected an array of records or an object of column arrays');
}

function castCsvValue(value: string): CellValue {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const lower = trimmed.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : value;
}

function parseCsvBody(body: Buffer): ForecastDataset {
  const records: Record<string, string>[] = parseCsv(body.toString('utf-8'), {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  });
  const rows = records.map(record => {
    const row: ForecastRow = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = castCsvValue(value);
    }
    return row;
  });
  return datasetFromRecords(rows);
}

function parseExcelBody(body: Buffer): ForecastDataset {
  const workbook = XLSX.read(body, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    throw new Error('Workbook contains no sheets');
  }
  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: null,
  });
  return datasetFromRecords(records.map(toRow));
}

async function parseParquetBody(body: Buffer): Promise<ForecastDataset> {
  // hyparquet reads from an ArrayBuffer; copy out exactly the bytes of this Buffer
  const file = new ArrayBuffer(body.byteLength);
  new Uint8Array(file).set(body);
  const records = await parquetReadObjects({ file });
  return datasetFromRecords(records.map(toRow));
}

/**
 * Decode a response body in the requested format.
 * Throws ForecastParseError with the underlying cause on malformed input.
 */
export async function parseResponseBody(
  body: Buffer,
  format: string,
  logger?: Logger
): Promise<ForecastDataset> {
  const normalized = format.trim().toLowerCase();
  let effective: ResponseFormat;

  if (isSupportedFormat(normalized)) {
    effective = normalized;
  } else {
    logger?.warn({ format }, `Unsupported format: ${format}, using default parser`);
    effective = DEFAULT_FORMAT;
  }

  try {
    switch (effective) {
      case 'json':
        return recordsFromJson(JSON.parse(body.toString('utf-8')));
      case 'csv':
        return parseCsvBody(body);
      case 'excel':
        return parseExcelBody(body);
      case 'parquet':
        return await parseParquetBody(body);
    }
  } catch (error) {
    logger?.error({ format: effective, err: error }, 'Failed to parse API response');
    throw new ForecastParseError(effective, error);
  }
}
