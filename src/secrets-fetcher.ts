// AWS Secrets Manager backend for the secret cache
import {
  DescribeSecretCommand,
  GetSecretValueCommand,
  SecretsManagerClient
} from '@aws-sdk/client-secrets-manager';
import { getSecretsClient } from './aws-clients';
import { SecretDescription, SecretVersion, SecretsFetcher } from './types';

/**
 * Fetches secret metadata and versions with the AWS SDK. Errors from the
 * client are passed through unchanged.
 */
export class SecretsManagerFetcher implements SecretsFetcher {
  constructor(private readonly client: SecretsManagerClient = getSecretsClient()) {}

  async describeSecret(secretId: string): Promise<SecretDescription> {
    const response = await this.client.send(new DescribeSecretCommand({ SecretId: secretId }));
    return {
      ARN: response.ARN,
      Name: response.Name,
      VersionIdsToStages: response.VersionIdsToStages
    };
  }

  async getSecretValue(secretId: string, versionId: string): Promise<SecretVersion> {
    const response = await this.client.send(
      new GetSecretValueCommand({ SecretId: secretId, VersionId: versionId })
    );
    return {
      ARN: response.ARN,
      Name: response.Name,
      VersionId: response.VersionId,
      SecretString: response.SecretString,
      SecretBinary: response.SecretBinary,
      VersionStages: response.VersionStages,
      CreatedDate: response.CreatedDate
    };
  }
}
