// Cached secret with its recently used versions
import { SecretCacheConfig } from './cache-config';
import { CACHE_DEFAULTS } from './constants';
import { LRUCache } from './lru-cache';
import { SecretCacheObject } from './secret-cache-object';
import { SecretCacheVersion } from './secret-cache-version';
import { SecretDescription, SecretVersion, SecretsFetcher, isSecretDescription } from './types';

/**
 * Cached metadata for one secret. Version stages are resolved against the
 * metadata, and the resolved versions are cached in a small LRU of their own.
 */
export class SecretCacheItem extends SecretCacheObject<SecretDescription> {
  private readonly versions = new LRUCache<string, SecretCacheVersion>(CACHE_DEFAULTS.VERSION_CACHE_SIZE);
  private nextRefreshTime: number;

  constructor(config: SecretCacheConfig, fetcher: SecretsFetcher, secretId: string) {
    super(config, fetcher, secretId);
    this.nextRefreshTime = Date.now();
  }

  /**
   * Find the version id carrying `versionStage` in DescribeSecret metadata.
   */
  static getVersionId(result: SecretDescription | undefined, versionStage: string): string | undefined {
    const versionIdsToStages = result?.VersionIdsToStages;
    if (!versionIdsToStages) {
      return undefined;
    }
    const match = Object.entries(versionIdsToStages).find(
      ([, stages]) => Array.isArray(stages) && stages.includes(versionStage)
    );
    return match?.[0];
  }

  protected isRefreshNeeded(): boolean {
    if (super.isRefreshNeeded()) {
      return true;
    }
    // While failing, retries follow the backoff schedule only.
    if (this.hasFailure()) {
      return false;
    }
    return this.nextRefreshTime <= Date.now();
  }

  protected async executeRefresh(): Promise<SecretDescription> {
    const result = await this.fetcher.describeSecret(this.secretId);
    // Spread refreshes uniformly over [interval / 2, interval].
    const interval = this.config.secretRefreshInterval;
    const seconds = interval / 2 + Math.random() * (interval / 2);
    this.nextRefreshTime = Date.now() + seconds * 1000;
    return result;
  }

  protected async getVersion(versionStage: string): Promise<SecretVersion | undefined> {
    const versionId = SecretCacheItem.getVersionId(this.getResult(), versionStage);
    if (!versionId) {
      return undefined;
    }
    const version = this.versions.get(versionId) ?? this.createVersion(versionId);
    return version.getSecretValue();
  }

  protected isResult(value: unknown): value is SecretDescription {
    return isSecretDescription(value);
  }

  private createVersion(versionId: string): SecretCacheVersion {
    const version = new SecretCacheVersion(this.config, this.fetcher, this.secretId, versionId);
    this.versions.putIfAbsent(versionId, version);
    return version;
  }
}
