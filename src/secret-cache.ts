// In-memory cache for AWS Secrets Manager secrets
import { SecretCacheConfig } from './cache-config';
import { LRUCache } from './lru-cache';
import { SecretCacheItem } from './secret-cache-item';
import { SecretsManagerFetcher } from './secrets-fetcher';
import { SecretsFetcher } from './types';

/**
 * Caches secret metadata and values so that repeated reads of a secret do not
 * each cost a round-trip to Secrets Manager.
 *
 * @example
 * ```typescript
 * const cache = new SecretCache(new SecretCacheConfig({ secretRefreshInterval: 900 }));
 * const password = await cache.getSecretString('prod/db-password');
 * ```
 */
export class SecretCache {
  private readonly cache: LRUCache<string, SecretCacheItem>;

  constructor(
    private readonly config: SecretCacheConfig = new SecretCacheConfig(),
    private readonly fetcher: SecretsFetcher = new SecretsManagerFetcher()
  ) {
    this.cache = new LRUCache<string, SecretCacheItem>(config.maxCacheSize);
  }

  /**
   * Get the secret string for `secretId`, or undefined when the requested
   * stage has no version or the version has no string value.
   */
  async getSecretString(secretId: string, versionStage?: string): Promise<string | undefined> {
    const secret = await this.getCachedSecret(secretId).getSecretValue(versionStage);
    return secret?.SecretString;
  }

  /**
   * Get the secret binary for `secretId`, or undefined when the requested
   * stage has no version or the version has no binary value.
   */
  async getSecretBinary(secretId: string, versionStage?: string): Promise<Uint8Array | undefined> {
    const secret = await this.getCachedSecret(secretId).getSecretValue(versionStage);
    return secret?.SecretBinary;
  }

  /**
   * Make the next read of `secretId` go to the backend.
   */
  refreshSecretNow(secretId: string): void {
    this.getCachedSecret(secretId).refreshSecretNow();
  }

  private getCachedSecret(secretId: string): SecretCacheItem {
    const cached = this.cache.get(secretId);
    if (cached) {
      return cached;
    }
    // Construction does no I/O; the first fetch happens on read.
    const item = new SecretCacheItem(this.config, this.fetcher, secretId);
    this.cache.putIfAbsent(secretId, item);
    return item;
  }
}
