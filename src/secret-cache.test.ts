// Unit tests for the secret cache
import { SecretCacheConfig } from './cache-config';
import { SecretCacheHook } from './cache-hook';
import { SecretCache } from './secret-cache';
import { TEST_SECRET_ID, createDescription, createStubFetcher } from './test-helpers';

describe('SecretCache', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getSecretString', () => {
    it('should fetch metadata and the version at most once within the refresh interval', async () => {
      const { fetcher, describeSecret, getSecretValue } = createStubFetcher(
        createDescription({ v1: ['current'] }),
        { SecretString: 'mysecret' }
      );
      const cache = new SecretCache(new SecretCacheConfig({ defaultVersionStage: 'current' }), fetcher);

      for (let i = 0; i < 5; i++) {
        await expect(cache.getSecretString('id')).resolves.toBe('mysecret');
      }

      expect(describeSecret).toHaveBeenCalledTimes(1);
      expect(describeSecret).toHaveBeenCalledWith('id');
      expect(getSecretValue).toHaveBeenCalledTimes(1);
      expect(getSecretValue).toHaveBeenCalledWith('id', 'v1');
    });

    it('should return undefined for a stage without a version', async () => {
      const { fetcher } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretString(TEST_SECRET_ID, 'AWSPREVIOUS')).resolves.toBeUndefined();
    });

    it('should return undefined for a binary secret', async () => {
      const { fetcher } = createStubFetcher(undefined, { SecretBinary: new Uint8Array([1]) });
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretString(TEST_SECRET_ID)).resolves.toBeUndefined();
    });

    it('should reject with the backend error when nothing is cached', async () => {
      const { fetcher, describeSecret } = createStubFetcher();
      const error = new Error('ResourceNotFoundException');
      describeSecret.mockRejectedValue(error);
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretString(TEST_SECRET_ID)).rejects.toBe(error);
    });

    it('should share one fetch between concurrent callers', async () => {
      const { fetcher, describeSecret, getSecretValue } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      const results = await Promise.all([
        cache.getSecretString(TEST_SECRET_ID),
        cache.getSecretString(TEST_SECRET_ID),
        cache.getSecretString(TEST_SECRET_ID)
      ]);

      expect(results).toEqual(['test-secret', 'test-secret', 'test-secret']);
      expect(describeSecret).toHaveBeenCalledTimes(1);
      expect(getSecretValue).toHaveBeenCalledTimes(1);
    });
  });

  describe('getSecretBinary', () => {
    it('should return the binary value', async () => {
      const { fetcher } = createStubFetcher(undefined, { SecretBinary: new Uint8Array([0x0a, 0x0b, 0x0c]) });
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretBinary(TEST_SECRET_ID)).resolves.toEqual(new Uint8Array([0x0a, 0x0b, 0x0c]));
    });

    it('should return undefined for a string secret', async () => {
      const { fetcher } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretBinary(TEST_SECRET_ID)).resolves.toBeUndefined();
    });

    it('should return undefined for a secret without versions', async () => {
      const { fetcher } = createStubFetcher({ Name: TEST_SECRET_ID });
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await expect(cache.getSecretBinary(TEST_SECRET_ID)).resolves.toBeUndefined();
    });
  });

  describe('refreshSecretNow', () => {
    it('should make the next read go to the backend', async () => {
      const { fetcher, describeSecret } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await cache.getSecretString(TEST_SECRET_ID);
      cache.refreshSecretNow(TEST_SECRET_ID);
      await cache.getSecretString(TEST_SECRET_ID);

      expect(describeSecret).toHaveBeenCalledTimes(2);
    });

    it('should serve the cached value when the forced refresh fails', async () => {
      const { fetcher, describeSecret } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig(), fetcher);

      await cache.getSecretString(TEST_SECRET_ID);
      describeSecret.mockRejectedValue(new Error('throttled'));
      cache.refreshSecretNow(TEST_SECRET_ID);

      await expect(cache.getSecretString(TEST_SECRET_ID)).resolves.toBe('test-secret');
    });
  });

  describe('capacity', () => {
    it('should drop the least recently used secret', async () => {
      const { fetcher, describeSecret } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig({ maxCacheSize: 1 }), fetcher);

      await cache.getSecretString('first');
      await cache.getSecretString('second');
      await cache.getSecretString('first');

      expect(describeSecret.mock.calls).toEqual([['first'], ['second'], ['first']]);
    });

    it('should fetch on every read with a zero cache size', async () => {
      const { fetcher, describeSecret } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig({ maxCacheSize: 0 }), fetcher);

      await expect(cache.getSecretString(TEST_SECRET_ID)).resolves.toBe('test-secret');
      await expect(cache.getSecretString(TEST_SECRET_ID)).resolves.toBe('test-secret');

      expect(describeSecret).toHaveBeenCalledTimes(2);
    });
  });

  describe('cache hook', () => {
    it('should pass every stored result through the hook', async () => {
      const sealed = new Map<number, object>();
      const hook: SecretCacheHook = {
        put: (value: object) => {
          sealed.set(sealed.size, value);
          return sealed.size - 1;
        },
        get: (stored: unknown) => (typeof stored === 'number' ? sealed.get(stored) : undefined)
      };
      const put = jest.spyOn(hook, 'put');
      const get = jest.spyOn(hook, 'get');
      const { fetcher } = createStubFetcher();
      const cache = new SecretCache(new SecretCacheConfig({ secretCacheHook: hook }), fetcher);

      await expect(cache.getSecretString(TEST_SECRET_ID)).resolves.toBe('test-secret');

      expect(put).toHaveBeenCalledTimes(2);
      expect(get).toHaveBeenCalledTimes(2);
      expect(get).toHaveBeenNthCalledWith(1, 0);
      expect(get).toHaveBeenNthCalledWith(2, 1);
    });
  });
});
