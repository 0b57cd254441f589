import NodeCache from 'node-cache';

import type { ICacheStats, ISimpleCache, SimpleCacheOptions } from './cache.interfaces';

// Thin typed view over node-cache; values are stored by reference.
export class SimpleCacheImpl<T> implements ISimpleCache<T> {
  private readonly cache: NodeCache;

  public constructor(options: SimpleCacheOptions) {
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: 0,
      useClones: false,
    });
  }

  public get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public set(key: string, value: T): void {
    this.cache.set(key, value);
  }

  public setMany(values: ReadonlyMap<string, T>): void {
    this.cache.mset(
      [...values].map(([key, val]: [string, T]): NodeCache.ValueSetItem<T> => ({ key, val })),
    );
  }

  public entries(): ReadonlyMap<string, T> {
    return new Map<string, T>(Object.entries(this.cache.mget<T>(this.cache.keys())));
  }

  public clear(): void {
    this.cache.flushAll();
  }

  public stats(): ICacheStats {
    const { keys, hits, misses }: NodeCache.Stats = this.cache.getStats();
    return { keys, hits, misses };
  }
}
