/**
 * Hook into the in-memory cache. `put` prepares a fetched result for storage
 * and `get` derives the result back from what was stored, e.g. to keep
 * secrets encrypted while they sit in memory.
 *
 * Both functions run while the owning entry is locked: keep them fast and do
 * not call back into the cache from them.
 */
export interface SecretCacheHook {
  put(value: object): unknown;
  get(stored: unknown): unknown;
}
