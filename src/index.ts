export { SecretCache } from './secret-cache';
export { SecretCacheConfig } from './cache-config';
export type { SecretCacheOptions } from './cache-config';
export type { SecretCacheHook } from './cache-hook';
export { SecretsManagerFetcher } from './secrets-fetcher';
export { getSecretsClient } from './aws-clients';
export { LRUCache } from './lru-cache';
export { injectSecretString } from './inject-secret';
export { SecretCacheError, ConfigurationError, ValidationError, SecretNotFoundError } from './errors';
export type { SecretDescription, SecretVersion, SecretsFetcher } from './types';
