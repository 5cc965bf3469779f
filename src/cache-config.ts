// Immutable configuration for SecretCache instances
import { SecretCacheHook } from './cache-hook';
import { CACHE_DEFAULTS } from './constants';
import { ConfigurationError } from './errors';
import { validators } from './validation';

export interface SecretCacheOptions {
  /** Maximum number of secrets held by the cache. */
  maxCacheSize?: number;
  /** Milliseconds to wait after a failed fetch before retrying. */
  exceptionRetryDelayBase?: number;
  /** Multiplier applied to the retry delay for each consecutive failure. */
  exceptionRetryGrowthFactor?: number;
  /** Upper bound for the retry delay, in milliseconds. */
  exceptionRetryDelayMax?: number;
  /** Stage requested when the caller does not name one. */
  defaultVersionStage?: string;
  /** Seconds between metadata refreshes of a cached secret. */
  secretRefreshInterval?: number;
  secretCacheHook?: SecretCacheHook;
}

const OPTION_NAMES = new Set<string>([
  'maxCacheSize',
  'exceptionRetryDelayBase',
  'exceptionRetryGrowthFactor',
  'exceptionRetryDelayMax',
  'defaultVersionStage',
  'secretRefreshInterval',
  'secretCacheHook'
] satisfies (keyof SecretCacheOptions)[]);

export class SecretCacheConfig {
  readonly maxCacheSize: number;
  readonly exceptionRetryDelayBase: number;
  readonly exceptionRetryGrowthFactor: number;
  readonly exceptionRetryDelayMax: number;
  readonly defaultVersionStage: string;
  readonly secretRefreshInterval: number;
  readonly secretCacheHook: SecretCacheHook | undefined;

  constructor(options: SecretCacheOptions = {}) {
    for (const key of Object.keys(options)) {
      if (!OPTION_NAMES.has(key)) {
        throw new ConfigurationError(key);
      }
    }

    this.maxCacheSize = options.maxCacheSize ?? CACHE_DEFAULTS.MAX_CACHE_SIZE;
    this.exceptionRetryDelayBase = options.exceptionRetryDelayBase ?? CACHE_DEFAULTS.EXCEPTION_RETRY_DELAY_BASE;
    this.exceptionRetryGrowthFactor =
      options.exceptionRetryGrowthFactor ?? CACHE_DEFAULTS.EXCEPTION_RETRY_GROWTH_FACTOR;
    this.exceptionRetryDelayMax = options.exceptionRetryDelayMax ?? CACHE_DEFAULTS.EXCEPTION_RETRY_DELAY_MAX;
    this.defaultVersionStage = options.defaultVersionStage ?? CACHE_DEFAULTS.DEFAULT_VERSION_STAGE;
    this.secretRefreshInterval = options.secretRefreshInterval ?? CACHE_DEFAULTS.SECRET_REFRESH_INTERVAL;
    this.secretCacheHook = options.secretCacheHook;

    validators.maxCacheSize().validate(this.maxCacheSize);
    validators.exceptionRetryDelayBase().validate(this.exceptionRetryDelayBase);
    validators.exceptionRetryGrowthFactor().validate(this.exceptionRetryGrowthFactor);
    validators.exceptionRetryDelayMax().validate(this.exceptionRetryDelayMax);
    validators.secretRefreshInterval().validate(this.secretRefreshInterval);
    validators.defaultVersionStage().validate(this.defaultVersionStage);

    Object.freeze(this);
  }
}
