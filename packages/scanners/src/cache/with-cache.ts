// packages/scanners/src/cache/with-cache.ts
import { CacheStore } from "./cache-store.js";
import { DEFAULT_CACHE_DIR } from "./types.js";

/**
 * Options for the withCacheStore wrapper
 */
export interface WithCacheOptions {
  /** Cache directory (default `.code_cache`) */
  cacheDir?: string;
  /** Clear every entry before the callback runs */
  clearCache?: boolean;
  /** Callback for verbose logging */
  onVerbose?: (message: string) => void;
}

/**
 * Result from withCacheStore including cache statistics
 */
export interface WithCacheResult<T> {
  /** The result from the callback */
  result: T;
  /** Cache statistics after the callback finished */
  stats?: {
    entryCount: number;
  };
}

/**
 * Open the cache store, hand it to the callback and report how many
 * entries it holds afterwards.
 *
 * @example
 * ```typescript
 * const { result } = await withCacheStore(async (cache) => {
 *   const pipeline = new CollectionPipeline({ cache });
 *   return pipeline.collect(projectRoot);
 * }, { cacheDir: ".code_cache" });
 * ```
 */
export async function withCacheStore<T>(
  callback: (cache: CacheStore) => Promise<T>,
  options: WithCacheOptions = {},
): Promise<WithCacheResult<T>> {
  const { cacheDir = DEFAULT_CACHE_DIR, clearCache = false, onVerbose } = options;

  const cache = await CacheStore.open(cacheDir);
  onVerbose?.(`Cache opened at ${cache.cacheDir} (${cache.size} entries)`);

  if (clearCache) {
    const removed = await cache.clear();
    onVerbose?.(`Cache cleared (${removed} entries)`);
  }

  const result = await callback(cache);

  return {
    result,
    stats: { entryCount: cache.size },
  };
}

/**
 * Execute a callback with an optional cache store.
 *
 * If caching is disabled the callback receives undefined and the cache
 * directory is never touched.
 */
export async function withOptionalCacheStore<T>(
  enabled: boolean,
  callback: (cache: CacheStore | undefined) => Promise<T>,
  options: WithCacheOptions = {},
): Promise<WithCacheResult<T>> {
  if (!enabled) {
    const result = await callback(undefined);
    return { result };
  }

  return withCacheStore(callback, options);
}
