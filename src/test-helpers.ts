// Test utilities for the secret cache
import { SecretDescription, SecretVersion, SecretsFetcher } from './types';

export const TEST_SECRET_ID = 'test/db-password';
export const TEST_SECRET_STRING = 'test-secret';

export function createDescription(versionIdsToStages: Record<string, string[]>): SecretDescription {
  return {
    ARN: `arn:aws:secretsmanager:us-east-1:123456789012:secret:${TEST_SECRET_ID}`,
    Name: TEST_SECRET_ID,
    VersionIdsToStages: versionIdsToStages
  };
}

/**
 * Create a stub backend whose operations are jest mocks
 */
export function createStubFetcher(
  description: SecretDescription = createDescription({ v1: ['AWSCURRENT'] }),
  version: SecretVersion = { VersionId: 'v1', SecretString: TEST_SECRET_STRING }
) {
  const describeSecret = jest.fn<Promise<SecretDescription>, [string]>().mockResolvedValue(description);
  const getSecretValue = jest.fn<Promise<SecretVersion>, [string, string]>().mockResolvedValue(version);
  const fetcher: SecretsFetcher = { describeSecret, getSecretValue };
  return { fetcher, describeSecret, getSecretValue };
}

/**
 * Pin Date.now to a controllable clock
 */
export function mockClock(start: number = 0) {
  let currentTime = start;
  jest.spyOn(Date, 'now').mockImplementation(() => currentTime);
  return {
    set(time: number): void {
      currentTime = time;
    }
  };
}
