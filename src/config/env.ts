/**
 * Environment Configuration
 *
 * Single place where process.env is read. Everything downstream receives
 * plain config objects built from `env`.
 */

import 'dotenv/config';

export interface AppEnv {
  NODE_ENV: string;
  DEBUG: boolean;
  LOG_LEVEL: string;
  HOST: string;
  PORT: number;
  CORS_ORIGINS: string;

  FORECAST_API_BASE_URL: string;
  FORECAST_API_TIMEOUT: number; // seconds
  FORECAST_API_FORMAT: string;

  CACHE_ENABLED: boolean;
  CACHE_TIMEOUT: number; // seconds
  ERROR_HISTORY_LIMIT: number;
}

type EnvSource = Record<string, string | undefined>;

const TRUTHY = new Set(['true', '1', 't', 'yes']);

export function getBool(source: EnvSource, key: string, def: boolean): boolean {
  const val = source[key];
  if (val === undefined || val.trim() === '') return def;
  return TRUTHY.has(val.trim().toLowerCase());
}

export function getInt(source: EnvSource, key: string, def: number): number {
  const val = source[key];
  if (val === undefined || val.trim() === '') return def;
  const num = Number(val);
  return Number.isInteger(num) ? num : def;
}

export function getStr(source: EnvSource, key: string, def: string): string {
  const val = source[key];
  return val === undefined || val === '' ? def : val;
}

export function readEnv(source: EnvSource = process.env): AppEnv {
  return Object.freeze({
    NODE_ENV: getStr(source, 'NODE_ENV', 'development'),
    DEBUG: getBool(source, 'DEBUG', false),
    LOG_LEVEL: getStr(source, 'LOG_LEVEL', 'info'),
    HOST: getStr(source, 'HOST', '0.0.0.0'),
    PORT: getInt(source, 'PORT', 8050),
    CORS_ORIGINS: getStr(source, 'CORS_ORIGINS', '*'),

    FORECAST_API_BASE_URL: getStr(source, 'FORECAST_API_BASE_URL', 'http://localhost:8000/api'),
    FORECAST_API_TIMEOUT: getInt(source, 'FORECAST_API_TIMEOUT', 30),
    FORECAST_API_FORMAT: getStr(source, 'FORECAST_API_FORMAT', 'json'),

    CACHE_ENABLED: getBool(source, 'CACHE_ENABLED', true),
    CACHE_TIMEOUT: getInt(source, 'CACHE_TIMEOUT', 300),
    ERROR_HISTORY_LIMIT: getInt(source, 'ERROR_HISTORY_LIMIT', 100),
  });
}

export const env: AppEnv = readEnv();
