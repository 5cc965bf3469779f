// Wrap a function so it receives a cached secret as its first argument
import { SecretNotFoundError } from './errors';
import { SecretCache } from './secret-cache';

export function injectSecretString<A extends unknown[], R>(
  cache: SecretCache,
  secretId: string,
  fn: (secret: string, ...args: A) => R | Promise<R>
): (...args: A) => Promise<R> {
  return async (...args: A): Promise<R> => {
    const secret = await cache.getSecretString(secretId);
    if (secret === undefined) {
      throw new SecretNotFoundError(secretId);
    }
    return fn(secret, ...args);
  };
}
