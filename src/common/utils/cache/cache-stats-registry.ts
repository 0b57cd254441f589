import type { ICacheStats, ICacheStatsSource } from './cache.interfaces';

const sources: Map<string, ICacheStatsSource> = new Map<string, ICacheStatsSource>();

// Re-registering a name replaces the previous source; the latest instance reports.
export function registerCache(name: string, source: ICacheStatsSource): void {
  sources.set(name, source);
}

export function getAllCacheStats(): ReadonlyMap<string, ICacheStats> {
  return new Map<string, ICacheStats>(
    [...sources.keys()]
      .sort()
      .flatMap((name: string): [string, ICacheStats][] => {
        const source: ICacheStatsSource | undefined = sources.get(name);
        return source === undefined ? [] : [[name, source.stats()]];
      }),
  );
}
