export { FileCacheStore, type FileCacheStoreOptions } from "./file-cache-store.js";
export { MemoryCacheStore, type MemoryCacheStoreOptions } from "./memory-cache-store.js";
export { analysisKey, historyCommitsKey, historyHeadKey, remotePageKey } from "./keys.js";
export {
  type CacheLookup,
  type CacheMissReason,
  type CacheStore,
  type CachedEntry,
  readCached,
} from "./types.js";
