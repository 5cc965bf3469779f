// Custom error types for the secret cache
import { ERROR_CODES } from './constants';

export class SecretCacheError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SecretCacheError';
  }
}

export class ConfigurationError extends SecretCacheError {
  constructor(option: string) {
    super(`Unexpected configuration option '${option}'`, ERROR_CODES.UNKNOWN_CONFIG_OPTION);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends SecretCacheError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_CONFIG_VALUE);
    this.name = 'ValidationError';
  }
}

export class SecretNotFoundError extends SecretCacheError {
  constructor(secretId: string) {
    super(`Secret not found: ${secretId}`, ERROR_CODES.SECRET_NOT_FOUND);
    this.name = 'SecretNotFoundError';
  }
}
