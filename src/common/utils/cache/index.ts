export type {
  ICacheStats,
  ICacheStatsSource,
  ISimpleCache,
  SimpleCacheOptions,
} from './cache.interfaces';
export { SimpleCacheImpl } from './simple-cache';
export { registerCache, getAllCacheStats } from './cache-stats-registry';
