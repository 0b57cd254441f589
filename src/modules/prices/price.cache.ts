import { Injectable } from '@nestjs/common';

import type { ICoinTicker } from '../../common/interfaces/token-pricing/token-pricing.interfaces';
import { registerCache, SimpleCacheImpl } from '../../common/utils/cache';

/**
 * Asset key id → latest snapshot. Entries are never evicted; a refresh overwrites the keys it
 * returned and leaves the rest. `lastResolvedIds` and `lastFetchedAtMs` describe the most recent
 * completed refresh.
 */
@Injectable()
export class PriceCache {
  private readonly snapshots: SimpleCacheImpl<ICoinTicker>;
  private lastResolvedIds: ReadonlySet<string> | null = null;
  private lastFetchedAtMs: number | null = null;

  public constructor() {
    this.snapshots = new SimpleCacheImpl<ICoinTicker>({ ttlSec: 0 });
    registerCache('prices', this.snapshots);
  }

  public get(assetKeyId: string): ICoinTicker | undefined {
    return this.snapshots.get(assetKeyId);
  }

  public snapshot(): ReadonlyMap<string, ICoinTicker> {
    return this.snapshots.entries();
  }

  public isFresh(tickerIds: ReadonlySet<string>, nowMs: number, lifetimeSec: number): boolean {
    if (this.lastResolvedIds === null || this.lastFetchedAtMs === null) {
      return false;
    }

    if (!this.hasSameIds(this.lastResolvedIds, tickerIds)) {
      return false;
    }

    return nowMs - this.lastFetchedAtMs <= lifetimeSec * 1000;
  }

  public commit(
    tickers: ReadonlyMap<string, ICoinTicker>,
    tickerIds: ReadonlySet<string>,
    fetchedAtMs: number,
  ): void {
    this.snapshots.setMany(tickers);

    this.lastResolvedIds = new Set<string>(tickerIds);
    this.lastFetchedAtMs = fetchedAtMs;
  }

  public get lastFetchedAt(): number | null {
    return this.lastFetchedAtMs;
  }

  private hasSameIds(left: ReadonlySet<string>, right: ReadonlySet<string>): boolean {
    if (left.size !== right.size) {
      return false;
    }

    for (const id of left) {
      if (!right.has(id)) {
        return false;
      }
    }

    return true;
  }
}
