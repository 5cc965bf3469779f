// Shared refresh and retry logic for cached secret objects
import { SecretCacheConfig } from './cache-config';
import { EntryLock } from './entry-lock';
import { SecretVersion, SecretsFetcher } from './types';

interface Failure {
  error: unknown;
}

/**
 * A cached backend result that refreshes itself on read when it is due and
 * backs off exponentially after failed refreshes.
 *
 * Subclasses decide what a refresh fetches, when it is due, and how a version
 * stage resolves against the stored result. All state is read and written
 * under a per-entry lock, so concurrent readers of one entry trigger at most
 * one fetch between them.
 */
export abstract class SecretCacheObject<T extends object> {
  private readonly lock = new EntryLock();
  private stored: unknown = undefined;
  private failure: Failure | undefined;
  private exceptionCount = 0;
  private refreshNeeded = true;
  private nextRetryTime: number | undefined;

  constructor(
    protected readonly config: SecretCacheConfig,
    protected readonly fetcher: SecretsFetcher,
    protected readonly secretId: string
  ) {}

  /**
   * Fetch a fresh result from the backend.
   */
  protected abstract executeRefresh(): Promise<T>;

  /**
   * Resolve the secret version for `versionStage` from the stored result.
   */
  protected abstract getVersion(versionStage: string): Promise<SecretVersion | undefined>;

  /**
   * Narrow a value read back from storage (possibly through the hook).
   */
  protected abstract isResult(value: unknown): value is T;

  protected isRefreshNeeded(): boolean {
    if (this.refreshNeeded) {
      return true;
    }
    if (this.failure === undefined || this.nextRetryTime === undefined) {
      return false;
    }
    return this.nextRetryTime <= Date.now();
  }

  protected hasFailure(): boolean {
    return this.failure !== undefined;
  }

  /**
   * Get a copy of the cached secret version for the given stage, refreshing
   * first when due. Stale data is returned in preference to an error; the
   * last fetch error is thrown only when nothing resolves.
   */
  async getSecretValue(versionStage?: string): Promise<SecretVersion | undefined> {
    const stage = versionStage || this.config.defaultVersionStage;
    return this.lock.runExclusive(async () => {
      await this.refresh();
      const value = await this.getVersion(stage);
      if (value === undefined && this.failure !== undefined) {
        throw this.failure.error;
      }
      return value === undefined ? undefined : structuredClone(value);
    });
  }

  /**
   * Force a refresh on the next read, regardless of timers.
   */
  refreshSecretNow(): void {
    this.refreshNeeded = true;
  }

  protected getResult(): T | undefined {
    if (this.stored === undefined) {
      return undefined;
    }
    const hook = this.config.secretCacheHook;
    const value = hook ? hook.get(this.stored) : this.stored;
    return this.isResult(value) ? value : undefined;
  }

  private setResult(result: T): void {
    const hook = this.config.secretCacheHook;
    this.stored = hook ? hook.put(result) : result;
  }

  private async refresh(): Promise<void> {
    if (!this.isRefreshNeeded()) {
      return;
    }
    this.refreshNeeded = false;
    try {
      this.setResult(await this.executeRefresh());
      this.failure = undefined;
      this.exceptionCount = 0;
    } catch (error) {
      this.failure = { error };
      const { exceptionRetryDelayBase: base, exceptionRetryGrowthFactor: growth, exceptionRetryDelayMax: max } =
        this.config;
      const delay = Math.min(base * growth ** this.exceptionCount, max);
      // Stop growing once capped; growth ** count must stay finite or base 0 yields NaN.
      if (delay < max && Number.isFinite(growth ** (this.exceptionCount + 1))) {
        this.exceptionCount += 1;
      }
      this.nextRetryTime = Date.now() + delay;
      console.error(`Failed to refresh cached secret ${this.secretId}, retrying in ${delay}ms:`, error);
    }
  }
}
