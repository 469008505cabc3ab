/**
 * Configuration
 * Reads TfL credentials and server settings from the process environment
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { TflApiConfig } from '../types/server.types.js';

export const TFL_API_BASE = 'https://api.tfl.gov.uk';

export const API_CONFIG = {
  REQUEST_TIMEOUT: 30 * 1000,        // 30 seconds per upstream request
  DEFAULT_HTTP_PORT: 8080,
  DEFAULT_HTTP_HOST: '0.0.0.0'
} as const;

/**
 * Load a local .env file outside production.
 * `quiet` keeps dotenv from writing to stdout, which carries the STDIO transport.
 */
export function loadEnvironmentVariables(): void {
  if (process.env.NODE_ENV === 'production') {
    return;
  }

  dotenv.config({ path: path.join(process.cwd(), '.env'), quiet: true });
}

export function loadTflConfig(env: NodeJS.ProcessEnv = process.env): TflApiConfig {
  return {
    baseUrl: (env.TFL_API_BASE || TFL_API_BASE).replace(/\/+$/, ''),
    appId: env.TFL_APP_ID ?? '',
    appKey: env.TFL_APP_KEY ?? '',
    timeoutMs: API_CONFIG.REQUEST_TIMEOUT
  };
}
