/**
 * Runtime configuration: environment variables, overridden by CLI flags.
 *
 *   RELAY_HOST         listen address        (127.0.0.1)
 *   RELAY_PORT / PORT  listen port           (8520)
 *   RELAY_TIMEOUT_MS   upstream timeout, ms  (30000)
 *   RELAY_CACHE_SIZE   resolution entries    (128)
 *   DEBUG              verbose console logging
 */

import { RelayError } from '../types.js';
import { DEFAULT_CACHE_SIZE } from './resolution-cache.js';
import { parseFlag } from './debug.js';

export interface RelayConfig {
  host: string;
  port: number;
  requestTimeoutMs: number;
  cacheSize: number;
  debug: boolean;
}

export const DEFAULT_CONFIG: RelayConfig = {
  host: '127.0.0.1',
  port: 8520,
  requestTimeoutMs: 30000,
  cacheSize: DEFAULT_CACHE_SIZE,
  debug: false,
};

function parsePositiveInt(name: string, raw: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new RelayError(`${name} must be a positive integer${max < Number.MAX_SAFE_INTEGER ? ` up to ${max}` : ''}, got "${raw}"`, 'CONFIG');
  }
  return value;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RelayConfig> = {},
): RelayConfig {
  const config: RelayConfig = {
    host: overrides.host ?? (env.RELAY_HOST?.trim() || DEFAULT_CONFIG.host),
    port: overrides.port ?? parsePositiveInt('RELAY_PORT', env.RELAY_PORT ?? env.PORT, DEFAULT_CONFIG.port, 65535),
    requestTimeoutMs: overrides.requestTimeoutMs ??
      parsePositiveInt('RELAY_TIMEOUT_MS', env.RELAY_TIMEOUT_MS, DEFAULT_CONFIG.requestTimeoutMs),
    cacheSize: overrides.cacheSize ?? parsePositiveInt('RELAY_CACHE_SIZE', env.RELAY_CACHE_SIZE, DEFAULT_CONFIG.cacheSize),
    debug: overrides.debug ?? parseFlag(env.DEBUG),
  };

  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    throw new RelayError(`port must be between 1 and 65535, got ${config.port}`, 'CONFIG');
  }
  return config;
}
