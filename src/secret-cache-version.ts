// Cached secret version
import { SecretCacheConfig } from './cache-config';
import { SecretCacheObject } from './secret-cache-object';
import { SecretVersion, SecretsFetcher, isSecretVersion } from './types';

/**
 * A single immutable secret version. Once fetched it is only refreshed on
 * request or to retry a failed fetch.
 */
export class SecretCacheVersion extends SecretCacheObject<SecretVersion> {
  constructor(
    config: SecretCacheConfig,
    fetcher: SecretsFetcher,
    secretId: string,
    private readonly versionId: string
  ) {
    super(config, fetcher, secretId);
  }

  protected executeRefresh(): Promise<SecretVersion> {
    return this.fetcher.getSecretValue(this.secretId, this.versionId);
  }

  // The version is pinned, so the stage plays no part.
  protected async getVersion(): Promise<SecretVersion | undefined> {
    return this.getResult();
  }

  protected isResult(value: unknown): value is SecretVersion {
    return isSecretVersion(value);
  }
}
