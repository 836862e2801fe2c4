// packages/scanners/src/cache/types.ts

/** Cache directory used when none is configured */
export const DEFAULT_CACHE_DIR = ".code_cache";

/** Name of the index document inside the cache directory */
export const CACHE_INDEX_FILE = "cache_index.json";

/** Length of the project hash embedded in cache keys */
export const PROJECT_HASH_LENGTH = 16;

/** Longest slug kept in a cache key */
export const MAX_SLUG_LENGTH = 48;

/**
 * Report artifacts are named after their key, so an entry alone
 * tells which file in the cache directory belongs to it.
 */
export function artifactFileName(key: string): string {
  return `cache_${key}.txt`;
}

export const ARTIFACT_FILE_PATTERN = /^cache_.+\.txt$/;
