import type { ChainKey } from '../chain-key.interfaces';

export interface IAssetKey {
  readonly contractAddress: string;
  readonly chainKey: ChainKey;
}

export interface IRequestedAsset extends IAssetKey {
  readonly symbol: string;
}

// Caller-side grouping of wallet tokens; flattened before resolution.
export type TokensByChain = Readonly<Partial<Record<ChainKey, readonly IRequestedAsset[]>>>;

export interface ICatalogEntry {
  readonly id: string;
  readonly symbol: string;
  readonly name: string;
  readonly platforms: Readonly<Record<string, string>>;
}

export interface IResolvedTickerMapping extends IAssetKey {
  readonly tickerId: string;
}

export interface ICoinTicker {
  readonly id: string;
  readonly symbol: string;
  readonly name: string;
  readonly image: string | null;
  readonly priceUsd: number;
  readonly percentChange24h: number | null;
  readonly priceChange24h: number | null;
  readonly marketCap: number | null;
  readonly totalVolume: number | null;
  readonly high24h: number | null;
  readonly low24h: number | null;
  readonly lastUpdated: string | null;
}

export enum ChartHistoryPeriod {
  DAY = 'day',
  WEEK = 'week',
  MONTH = 'month',
  THREE_MONTH = 'threeMonth',
  YEAR = 'year',
}

export const CHART_HISTORY_PERIODS: readonly ChartHistoryPeriod[] = [
  ChartHistoryPeriod.DAY,
  ChartHistoryPeriod.WEEK,
  ChartHistoryPeriod.MONTH,
  ChartHistoryPeriod.THREE_MONTH,
  ChartHistoryPeriod.YEAR,
];

/* eslint-disable no-magic-numbers */
export const CHART_HISTORY_PERIOD_DAYS: Readonly<Record<ChartHistoryPeriod, number>> = {
  [ChartHistoryPeriod.DAY]: 1,
  [ChartHistoryPeriod.WEEK]: 7,
  [ChartHistoryPeriod.MONTH]: 30,
  [ChartHistoryPeriod.THREE_MONTH]: 90,
  [ChartHistoryPeriod.YEAR]: 365,
};
/* eslint-enable no-magic-numbers */

export type ChartHistoryPoint = readonly [timestampMs: number, priceUsd: number];

export interface IChartHistory {
  readonly prices: readonly ChartHistoryPoint[];
}

export const EMPTY_CHART_HISTORY: IChartHistory = Object.freeze({ prices: [] });

export interface ICoinTickersFetcher {
  fetchPrices(
    tokens: TokensByChain | readonly IRequestedAsset[],
  ): Promise<ReadonlyMap<string, ICoinTicker>>;
  fetchChartHistories(key: IAssetKey): Promise<readonly IChartHistory[]>;
  fetchChartHistory(
    force: boolean,
    period: ChartHistoryPeriod,
    key: IAssetKey,
  ): Promise<IChartHistory>;
}

export const buildAssetKeyId = (key: IAssetKey): string => {
  return `${key.chainKey}:${key.contractAddress.trim().toLowerCase()}`;
};
