/**
 * Configuration management for zipcast
 * Loads and validates environment variables
 */

import type { LogLevel } from '../domain/logger.js';

export interface AppConfig {
  // Weather API configuration
  nwsBaseUrl: string;
  nwsUserAgent: string;
  nwsTimeoutMs: number;

  // Logging
  logLevel: LogLevel;

  // Offline postal dataset (bundled table when unset)
  postalDbPath?: string;

  // Metadata
  appName: string;
  appVersion: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nwsBaseUrl = (env.NWS_BASE_URL || 'https://api.weather.gov').replace(/\/$/, '');

  // Validate base URL format
  try {
    new URL(nwsBaseUrl);
  } catch {
    throw new Error(`Invalid NWS_BASE_URL: ${nwsBaseUrl}`);
  }

  // The weather service rejects or throttles anonymous clients
  const nwsUserAgent = (env.NWS_USER_AGENT || '(zipcast/0.1.0, zipcast@example.com)').trim();
  if (!nwsUserAgent) {
    throw new Error('NWS_USER_AGENT must not be blank');
  }

  const rawTimeout = env.NWS_TIMEOUT_MS || '10000';
  const nwsTimeoutMs = parseInt(rawTimeout, 10);
  if (isNaN(nwsTimeoutMs) || nwsTimeoutMs <= 0) {
    throw new Error(`Invalid NWS_TIMEOUT_MS: ${rawTimeout}`);
  }

  const logLevel = env.ZIPCAST_LOG_LEVEL || 'error';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid ZIPCAST_LOG_LEVEL: ${logLevel}`);
  }

  const postalDbPath = env.POSTAL_DB_PATH || undefined;

  return {
    nwsBaseUrl,
    nwsUserAgent,
    nwsTimeoutMs,
    logLevel,
    postalDbPath,
    appName: 'zipcast',
    appVersion: '0.1.0',
  };
}

// Singleton config instance
let configInstance: AppConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
