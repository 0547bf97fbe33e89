export {
  TtlCache,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_CACHE_MAX_ENTRIES,
  type CacheEntry,
  type CacheLookup,
  type TtlCacheOptions,
} from './ttl-cache';
export {
  buildCacheKey,
  buildDailyInsightKey,
  formatLocalDate,
  truncateFreeText,
  FREE_TEXT_KEY_LENGTH,
  type CacheKeyPrimary,
} from './cache-key';
export { KeyedMutex } from './keyed-mutex';
export { TimeoutError, withTimeout } from './timeout';
