import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import pkg from '../../package.json' with { type: 'json' };

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PACKAGE_VERSION: string = pkg.version;

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_WX = process.env.DEBUG_WX === 'true';

export const AVWX_API_KEY = process.env.AVWX_API_KEY || '';
export const AVWX_BASE_URL = process.env.AVWX_BASE_URL || 'https://avwx.rest/api';
export const CONFIG_PATH = process.env.WXLINE_CONFIG || path.join(os.homedir(), '.config', 'wxline', 'config.json');

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const debugLog = (...args: unknown[]) => {
  if (DEBUG_WX) {
    console.log(...args);
  }
};
