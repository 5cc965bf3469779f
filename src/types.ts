// Shared types for the secret cache

/**
 * Secret metadata as returned by DescribeSecret. Only the fields the cache
 * reads are modelled.
 */
export interface SecretDescription {
  ARN?: string;
  Name?: string;
  VersionIdsToStages?: Record<string, string[]>;
}

/**
 * One immutable secret version as returned by GetSecretValue.
 */
export interface SecretVersion {
  ARN?: string;
  Name?: string;
  VersionId?: string;
  SecretString?: string;
  SecretBinary?: Uint8Array;
  VersionStages?: string[];
  CreatedDate?: Date;
}

/**
 * The two backend operations the cache depends on. Implementations must be
 * safe to call concurrently.
 */
export interface SecretsFetcher {
  describeSecret(secretId: string): Promise<SecretDescription>;
  getSecretValue(secretId: string, versionId: string): Promise<SecretVersion>;
}

export function isSecretDescription(value: unknown): value is SecretDescription {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('VersionIdsToStages' in value) || value.VersionIdsToStages === undefined) {
    return true;
  }
  return typeof value.VersionIdsToStages === 'object' && value.VersionIdsToStages !== null;
}

export function isSecretVersion(value: unknown): value is SecretVersion {
  return typeof value === 'object' && value !== null;
}
