export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
}

export interface ICacheStatsSource {
  stats(): ICacheStats;
}

export interface ISimpleCache<T> extends ICacheStatsSource {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  setMany(values: ReadonlyMap<string, T>): void;
  entries(): ReadonlyMap<string, T>;
  clear(): void;
}

// ttlSec = 0 keeps entries until they are overwritten or cleared.
export type SimpleCacheOptions = {
  readonly ttlSec: number;
};
