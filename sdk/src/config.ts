import dotenv from 'dotenv';
import { logger } from './logger';

export const PROD_API = 'https://hyp3-api.asf.alaska.edu';
export const TEST_API = 'https://hyp3-test-api.asf.alaska.edu';

export interface ClientConfig {
  apiUrl: string;
  token?: string;
  downloadRetries: number;
  downloadBackoffFactor: number;
  watchTimeout: number;
  watchInterval: number;
  logLevel: string;
}

let envLoaded = false;

function numberFromEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const n = parseFloat(raw);
  return Number.isNaN(n) ? fallback : n;
}

/**
 * Read client settings from the environment, loading `.env` (or `envFile`) the first time.
 * Values already set in the environment take precedence over the file.
 */
export function loadConfig(envFile?: string): ClientConfig {
  if (!envLoaded) {
    dotenv.config(envFile ? { path: envFile } : {});
    envLoaded = true;
    logger.level = process.env.HYP3_LOG_LEVEL || 'info';
  }

  return {
    apiUrl: process.env.HYP3_API_URL || PROD_API,
    token: process.env.HYP3_API_TOKEN || undefined,
    downloadRetries: numberFromEnv(process.env.HYP3_DOWNLOAD_RETRIES, 2),
    downloadBackoffFactor: numberFromEnv(process.env.HYP3_DOWNLOAD_BACKOFF_FACTOR, 1),
    watchTimeout: numberFromEnv(process.env.HYP3_WATCH_TIMEOUT, 10800),
    watchInterval: numberFromEnv(process.env.HYP3_WATCH_INTERVAL, 60),
    logLevel: process.env.HYP3_LOG_LEVEL || 'info',
  };
}
