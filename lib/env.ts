/**
 * Centralized environment configuration
 *
 * This module provides type-safe access to environment variables with defaults.
 * All environment variables should be accessed through this module to ensure consistency.
 */

/**
 * Get environment variable with fallback to default value
 */
function getEnv(key: string, defaultValue: string): string {
  if (typeof process !== 'undefined') {
    const value = process.env[key];
    if (value) {
      return value;
    }
  }
  return defaultValue;
}

/**
 * Get numeric environment variable with fallback to default value
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = getEnv(key, String(defaultValue));
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get boolean environment variable with fallback to default value
 */
function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = getEnv(key, String(defaultValue));
  return value === 'true' || value === '1';
}

/**
 * Get an environment variable restricted to a fixed set of values
 */
function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = getEnv(key, defaultValue);
  const match = choices.find((choice) => choice === value);
  return match ?? defaultValue;
}

export const RESOLUTION_MODES = ['screening', 'static'] as const;
export const WEIGHTING_MODES = ['equal', 'trend'] as const;
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type ResolutionModeSetting = (typeof RESOLUTION_MODES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Portfolio Configuration
 */
export const PORTFOLIO_CONFIG = {
  /**
   * Smallest investment amount accepted by the suggestion endpoint
   * Default: 5000
   */
  MIN_INVESTMENT_USD: getEnvNumber('MIN_INVESTMENT_USD', 5000),

  /**
   * Maximum number of strategies per request
   * Default: 2
   */
  MAX_STRATEGIES: getEnvNumber('MAX_STRATEGIES', 2),

  /**
   * Maximum number of instruments in a suggested portfolio
   * Default: 10
   */
  MAX_PORTFOLIO_SIZE: getEnvNumber('MAX_PORTFOLIO_SIZE', 10),

  /**
   * Ticker substituted when screening leaves nothing
   * Default: MSFT
   */
  FALLBACK_TICKER: getEnv('FALLBACK_TICKER', 'MSFT'),

  /**
   * How non-index strategies resolve: screening (fundamentals) or static baskets
   * Default: screening
   */
  RESOLUTION_MODE: getEnvChoice('RESOLUTION_MODE', RESOLUTION_MODES, 'screening'),

  /**
   * Weighting used when a request does not name one
   * Default: equal
   */
  DEFAULT_WEIGHTING: getEnvChoice('DEFAULT_WEIGHTING', WEIGHTING_MODES, 'equal'),
} as const;

/**
 * Market Data Configuration
 */
export const MARKET_DATA_CONFIG = {
  /**
   * Stooq base URL for quotes and daily history
   * Default: https://stooq.com
   */
  STOOQ_URL: getEnv('STOOQ_URL', 'https://stooq.com'),

  /**
   * Number of per-ticker requests in flight at once
   * Default: 4
   */
  FETCH_CONCURRENCY: getEnvNumber('FETCH_CONCURRENCY', 4),

  /**
   * Per-request timeout in milliseconds
   * Default: 10000 (10 seconds)
   */
  FETCH_TIMEOUT_MS: getEnvNumber('FETCH_TIMEOUT_MS', 10000),

  /**
   * Number of daily rows of history kept per ticker
   * Default: 30
   */
  HISTORY_ROWS: getEnvNumber('HISTORY_ROWS', 30),
} as const;

/**
 * Data Storage Configuration
 */
export const DATA_CONFIG = {
  /**
   * Fundamentals snapshot used for screening
   * Default: {project_root}/data/fundamentals.json
   */
  FUNDAMENTALS_FILE: getEnv('FUNDAMENTALS_FILE', ''),
} as const;

/**
 * Development & Debugging Configuration
 */
export const DEBUG_CONFIG = {
  /**
   * Enable debug logging
   * Default: false
   */
  DEBUG: getEnvBoolean('DEBUG', false),

  /**
   * Log level: error, warn, info, debug
   * Default: info
   */
  LOG_LEVEL: getEnvChoice('LOG_LEVEL', LOG_LEVELS, 'info'),
} as const;
