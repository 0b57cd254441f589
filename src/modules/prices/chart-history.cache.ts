import { Injectable } from '@nestjs/common';

import {
  ChartHistoryPeriod,
  type IChartHistory,
  type ICoinTicker,
} from '../../common/interfaces/token-pricing/token-pricing.interfaces';
import { registerCache, SimpleCacheImpl } from '../../common/utils/cache';

type ChartHistoryCacheEntry = {
  readonly history: IChartHistory;
  readonly fetchedAtMs: number;
};

// Keyed by snapshot identity, so a re-priced snapshot starts with an empty history.
const buildChartHistoryCacheKey = (ticker: ICoinTicker, period: ChartHistoryPeriod): string =>
  `${ticker.id}:${String(ticker.priceUsd)}:${period}`;

@Injectable()
export class ChartHistoryCache {
  private readonly entries: SimpleCacheImpl<ChartHistoryCacheEntry>;

  public constructor() {
    this.entries = new SimpleCacheImpl<ChartHistoryCacheEntry>({ ttlSec: 0 });
    registerCache('chart_history', this.entries);
  }

  // Only day series expire; longer periods stay until overwritten.
  public get(
    ticker: ICoinTicker,
    period: ChartHistoryPeriod,
    nowMs: number,
    dayLifetimeSec: number,
  ): IChartHistory | null {
    const entry: ChartHistoryCacheEntry | undefined = this.entries.get(
      buildChartHistoryCacheKey(ticker, period),
    );

    if (entry === undefined) {
      return null;
    }

    if (period === ChartHistoryPeriod.DAY && nowMs - entry.fetchedAtMs > dayLifetimeSec * 1000) {
      return null;
    }

    return entry.history;
  }

  public set(
    ticker: ICoinTicker,
    period: ChartHistoryPeriod,
    history: IChartHistory,
    fetchedAtMs: number,
  ): void {
    if (history.prices.length === 0) {
      return;
    }

    this.entries.set(buildChartHistoryCacheKey(ticker, period), { history, fetchedAtMs });
  }
}
