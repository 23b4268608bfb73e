/**
 * 캐시 모듈
 */

export type { CacheStore } from './CacheStore';
export { MemoryCacheStore } from './MemoryCacheStore';
export { FileCacheStore, LINEAGE_FILE, CACHE_DIR } from './FileCacheStore';
export type { FileCacheStoreOptions } from './FileCacheStore';
export { CacheIndex } from './CacheIndex';
export type { PrefixMatch } from './CacheIndex';
export { CacheResolver, skipCount } from './CacheResolver';
export { METADATA_SEPARATOR, encodeCacheFile, decodeCacheFile, decodeCacheMeta } from './cacheFile';
export type { CacheFileContent } from './cacheFile';
export { createLineage, canonicalLineageJson, parseLineage, formatLineage } from './lineage';
