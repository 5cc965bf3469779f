// Shared constants for the secret cache
export const CACHE_DEFAULTS = {
  MAX_CACHE_SIZE: 1024,
  EXCEPTION_RETRY_DELAY_BASE: 1000, // 1 second
  EXCEPTION_RETRY_GROWTH_FACTOR: 2,
  EXCEPTION_RETRY_DELAY_MAX: 60 * 60 * 1000, // 1 hour
  DEFAULT_VERSION_STAGE: 'AWSCURRENT',
  SECRET_REFRESH_INTERVAL: 60 * 60, // 1 hour, in seconds
  VERSION_CACHE_SIZE: 10
} as const;

export const ERROR_CODES = {
  UNKNOWN_CONFIG_OPTION: 'UNKNOWN_CONFIG_OPTION',
  INVALID_CONFIG_VALUE: 'INVALID_CONFIG_VALUE',
  SECRET_NOT_FOUND: 'SECRET_NOT_FOUND'
} as const;

// Keep in step with "version" in package.json (checked by constants.test.ts).
export const CLIENT_VERSION = '1.0.0';
export const USER_AGENT = `SecretsManagerCache/${CLIENT_VERSION}`;
