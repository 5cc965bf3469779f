// Shared AWS client instance for connection pooling
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { config } from './config';
import { USER_AGENT } from './constants';

let secretsClient: SecretsManagerClient | undefined;

export function getSecretsClient(): SecretsManagerClient {
  if (!secretsClient) {
    secretsClient = new SecretsManagerClient({
      region: config.aws.region,
      customUserAgent: USER_AGENT
    });
  }
  return secretsClient;
}
