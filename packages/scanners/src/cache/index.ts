// packages/scanners/src/cache/index.ts
export { CacheStore, type CacheEntryDetails } from "./cache-store.js";
export { withCacheStore, withOptionalCacheStore } from "./with-cache.js";
export type { WithCacheOptions, WithCacheResult } from "./with-cache.js";
export { computeProjectHash, hashContent, hashFile, projectSlug } from "./hashing.js";
export * from "./types.js";
