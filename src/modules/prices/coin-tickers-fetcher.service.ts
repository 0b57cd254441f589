import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

import { ChartHistoryCache } from './chart-history.cache';
import { PriceCache } from './price.cache';
import {
  AlreadyFetchingPricesError,
  AssetNotPricedError,
  FetchChartHistoryError,
} from './prices.errors';
import { TickerIdRegistry } from './ticker-id.registry';
import {
  type IPriceProviderClient,
  PRICE_PROVIDER_CLIENT,
  QUOTE_CURRENCY,
} from '../../common/interfaces/token-pricing/price-provider.interfaces';
import {
  buildAssetKeyId,
  CHART_HISTORY_PERIOD_DAYS,
  CHART_HISTORY_PERIODS,
  type ChartHistoryPeriod,
  EMPTY_CHART_HISTORY,
  type IAssetKey,
  type ICatalogEntry,
  type IChartHistory,
  type ICoinTicker,
  type ICoinTickersFetcher,
  type IRequestedAsset,
  type IResolvedTickerMapping,
  type TokensByChain,
} from '../../common/interfaces/token-pricing/token-pricing.interfaces';
import {
  executeWithExponentialBackoff,
  executeWithSoftFallback,
} from '../../common/utils/network/exponential-backoff.util';
import { AppConfigService } from '../../config/app-config.service';
import { MetricsService } from '../../observability/metrics.service';

@Injectable()
export class CoinTickersFetcherService implements ICoinTickersFetcher {
  private readonly logger: Logger = new Logger(CoinTickersFetcherService.name);
  private isFetchingPrices: boolean = false;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly tickerIdRegistry: TickerIdRegistry,
    private readonly priceCache: PriceCache,
    private readonly chartHistoryCache: ChartHistoryCache,
    @Inject(PRICE_PROVIDER_CLIENT) private readonly priceProviderClient: IPriceProviderClient,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public async fetchPrices(
    tokens: TokensByChain | readonly IRequestedAsset[],
  ): Promise<ReadonlyMap<string, ICoinTicker>> {
    if (this.isFetchingPrices) {
      this.metricsService?.priceFetchRejectedTotal.inc();
      throw new AlreadyFetchingPricesError();
    }

    this.isFetchingPrices = true;

    try {
      return await this.refreshPrices(this.flattenTokens(tokens));
    } finally {
      this.isFetchingPrices = false;
    }
  }

  public async fetchChartHistories(key: IAssetKey): Promise<readonly IChartHistory[]> {
    return Promise.all(
      CHART_HISTORY_PERIODS.map(
        async (period: ChartHistoryPeriod): Promise<IChartHistory> =>
          this.fetchChartHistory(false, period, key),
      ),
    );
  }

  public async fetchChartHistory(
    force: boolean,
    period: ChartHistoryPeriod,
    key: IAssetKey,
  ): Promise<IChartHistory> {
    const assetKeyId: string = buildAssetKeyId(key);

    if (this.priceCache.get(assetKeyId) === undefined) {
      throw new AssetNotPricedError(assetKeyId);
    }

    try {
      return await executeWithExponentialBackoff(
        async (): Promise<IChartHistory> => this.loadChartHistory(force, period, assetKeyId),
        {
          maxAttempts: this.appConfigService.priceProviderRetryAttempts,
          baseDelayMs: this.appConfigService.priceProviderRetryDelayMs,
          shouldRetry: (error: unknown): boolean => !(error instanceof AssetNotPricedError),
          onRetry: (error: unknown, attempt: number): void => {
            const errorMessage: string = error instanceof Error ? error.message : String(error);
            this.logger.warn(
              `chart_history_retry key=${assetKeyId} period=${period} attempt=${String(attempt)} reason=${errorMessage}`,
            );
          },
        },
      );
    } catch (error: unknown) {
      if (error instanceof AssetNotPricedError) {
        throw error;
      }

      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `chart_history_failed key=${assetKeyId} period=${period} reason=${errorMessage}`,
      );
      throw new FetchChartHistoryError();
    }
  }

  private async refreshPrices(
    assets: readonly IRequestedAsset[],
  ): Promise<ReadonlyMap<string, ICoinTicker>> {
    const catalog: readonly ICatalogEntry[] = await this.tickerIdRegistry.getCatalog();
    const mappings: readonly IResolvedTickerMapping[] = this.resolveMappings(assets, catalog);
    const tickerIds: ReadonlySet<string> = new Set<string>(
      mappings.map((mapping: IResolvedTickerMapping): string => mapping.tickerId),
    );

    const lifetimeSec: number = this.appConfigService.pricesCacheLifetimeSec;

    if (this.priceCache.isFresh(tickerIds, Date.now(), lifetimeSec)) {
      this.metricsService?.priceCacheLookupsTotal.inc({ cache: 'prices', result: 'hit' });
      this.logger.debug(`prices_cache_hit ids=${String(tickerIds.size)}`);
      return this.priceCache.snapshot();
    }

    this.metricsService?.priceCacheLookupsTotal.inc({ cache: 'prices', result: 'miss' });
    const tickers: ReadonlyMap<string, ICoinTicker> = await this.fetchAllPages(
      [...tickerIds],
      mappings,
    );

    this.priceCache.commit(tickers, tickerIds, Date.now());
    this.logger.log(
      `prices_refreshed assets=${String(assets.length)} resolved=${String(mappings.length)} ids=${String(tickerIds.size)} priced=${String(tickers.size)}`,
    );

    return this.priceCache.snapshot();
  }

  private async fetchAllPages(
    tickerIds: readonly string[],
    mappings: readonly IResolvedTickerMapping[],
  ): Promise<ReadonlyMap<string, ICoinTicker>> {
    const results: Map<string, ICoinTicker> = new Map<string, ICoinTicker>();
    const maxPages: number = this.appConfigService.pricesMaxPages;

    // An empty ids filter makes the markets endpoint list every coin.
    if (tickerIds.length === 0) {
      return results;
    }

    for (let page: number = 1; page <= maxPages; page += 1) {
      const pageTickers: readonly ICoinTicker[] = await this.fetchPricesPage(tickerIds, page);

      if (pageTickers.length === 0) {
        return results;
      }

      for (const ticker of pageTickers) {
        for (const mapping of mappings) {
          if (mapping.tickerId === ticker.id) {
            results.set(buildAssetKeyId(mapping), ticker);
          }
        }
      }
    }

    this.logger.warn(`prices_page_cap_reached maxPages=${String(maxPages)}`);
    return results;
  }

  private async fetchPricesPage(
    tickerIds: readonly string[],
    page: number,
  ): Promise<readonly ICoinTicker[]> {
    return executeWithSoftFallback(
      async (): Promise<readonly ICoinTicker[]> =>
        this.priceProviderClient.fetchPricesPage({ tickerIds, currency: QUOTE_CURRENCY, page }),
      {
        maxAttempts: this.appConfigService.priceProviderRetryAttempts,
        baseDelayMs: this.appConfigService.priceProviderRetryDelayMs,
        onRetry: (error: unknown, attempt: number): void => {
          const errorMessage: string = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `prices_page_retry page=${String(page)} attempt=${String(attempt)} reason=${errorMessage}`,
          );
        },
        fallback: (error: unknown): readonly ICoinTicker[] => {
          const errorMessage: string = error instanceof Error ? error.message : String(error);
          this.logger.warn(`prices_page_failed page=${String(page)} reason=${errorMessage}`);
          return [];
        },
      },
    );
  }

  private async loadChartHistory(
    force: boolean,
    period: ChartHistoryPeriod,
    assetKeyId: string,
  ): Promise<IChartHistory> {
    const ticker: ICoinTicker | undefined = this.priceCache.get(assetKeyId);

    if (ticker === undefined) {
      throw new AssetNotPricedError(assetKeyId);
    }

    if (!force) {
      const cached: IChartHistory | null = this.chartHistoryCache.get(
        ticker,
        period,
        Date.now(),
        this.appConfigService.dayChartHistoryCacheLifetimeSec,
      );

      if (cached !== null) {
        this.metricsService?.priceCacheLookupsTotal.inc({ cache: 'chart_history', result: 'hit' });
        return cached;
      }
    }

    this.metricsService?.priceCacheLookupsTotal.inc({ cache: 'chart_history', result: 'miss' });
    const history: IChartHistory = await this.requestChartHistory(ticker, period);
    this.chartHistoryCache.set(ticker, period, history, Date.now());

    return history;
  }

  private async requestChartHistory(
    ticker: ICoinTicker,
    period: ChartHistoryPeriod,
  ): Promise<IChartHistory> {
    return executeWithSoftFallback(
      async (): Promise<IChartHistory> =>
        this.priceProviderClient.fetchChartHistory({
          tickerId: ticker.id,
          currency: QUOTE_CURRENCY,
          days: CHART_HISTORY_PERIOD_DAYS[period],
        }),
      {
        maxAttempts: this.appConfigService.priceProviderRetryAttempts,
        baseDelayMs: this.appConfigService.priceProviderRetryDelayMs,
        fallback: (error: unknown): IChartHistory => {
          const errorMessage: string = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `chart_history_request_failed id=${ticker.id} period=${period} reason=${errorMessage}`,
          );
          return EMPTY_CHART_HISTORY;
        },
      },
    );
  }

  private resolveMappings(
    assets: readonly IRequestedAsset[],
    catalog: readonly ICatalogEntry[],
  ): readonly IResolvedTickerMapping[] {
    const mappings: IResolvedTickerMapping[] = [];

    for (const asset of assets) {
      const tickerId: string | null = this.tickerIdRegistry.resolve(asset, catalog);

      if (tickerId === null) {
        continue;
      }

      mappings.push({ tickerId, contractAddress: asset.contractAddress, chainKey: asset.chainKey });
    }

    return mappings;
  }

  private flattenTokens(
    tokens: TokensByChain | readonly IRequestedAsset[],
  ): readonly IRequestedAsset[] {
    if (isRequestedAssetList(tokens)) {
      return tokens;
    }

    const flattened: IRequestedAsset[] = [];

    for (const chainTokens of Object.values(tokens)) {
      if (chainTokens !== undefined) {
        flattened.push(...chainTokens);
      }
    }

    return flattened;
  }
}

const isRequestedAssetList = (
  tokens: TokensByChain | readonly IRequestedAsset[],
): tokens is readonly IRequestedAsset[] => Array.isArray(tokens);
