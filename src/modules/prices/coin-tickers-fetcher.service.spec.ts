import { ZeroAddress } from 'ethers';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ChartHistoryCache } from './chart-history.cache';
import { CoinTickersFetcherService } from './coin-tickers-fetcher.service';
import { PriceCache } from './price.cache';
import {
  AlreadyFetchingPricesError,
  AssetNotPricedError,
  FetchChartHistoryError,
} from './prices.errors';
import { TickerIdRegistry } from './ticker-id.registry';
import { ChainKey } from '../../common/interfaces/chain-key.interfaces';
import type {
  IChartHistoryRequestDto,
  IPriceProviderClient,
  IPricesPageRequestDto,
} from '../../common/interfaces/token-pricing/price-provider.interfaces';
import {
  ChartHistoryPeriod,
  EMPTY_CHART_HISTORY,
  type IAssetKey,
  type ICatalogEntry,
  type IChartHistory,
  type ICoinTicker,
  type IRequestedAsset,
} from '../../common/interfaces/token-pricing/token-pricing.interfaces';
import type { AppConfigService } from '../../config/app-config.service';
import { EthereumAddressCodec } from '../../integrations/address/ethereum/ethereum-address.codec';
import { MetricsService } from '../../observability/metrics.service';

type PriceProviderClientStub = {
  readonly fetchCatalog: ReturnType<typeof vi.fn>;
  readonly fetchPricesPage: ReturnType<typeof vi.fn>;
  readonly fetchChartHistory: ReturnType<typeof vi.fn>;
};

type AppConfigServiceStub = {
  readonly priceProviderRetryAttempts: number;
  readonly priceProviderRetryDelayMs: number;
  readonly pricesCacheLifetimeSec: number;
  readonly dayChartHistoryCacheLifetimeSec: number;
  readonly pricesMaxPages: number;
};

type FetcherFixture = {
  readonly service: CoinTickersFetcherService;
  readonly client: PriceProviderClientStub;
};

const USDT_ADDRESS = '0xdAC17F958D2ee523a2206206994597C13D831ec7';
const DAI_ADDRESS = '0x6B175474E89094C44Da98b954EedeAC495271d0F';
const ONE_HOUR_MS = 3_600_000;
const START_TIME: Date = new Date('2026-01-01T00:00:00.000Z');

const CATALOG: readonly ICatalogEntry[] = [
  { id: 'ethereum', symbol: 'eth', name: 'Ethereum', platforms: { ethereum: ZeroAddress } },
  { id: 'tether', symbol: 'usdt', name: 'Tether', platforms: { ethereum: USDT_ADDRESS } },
  { id: 'dai', symbol: 'dai', name: 'Dai', platforms: { ethereum: DAI_ADDRESS } },
];

const ETH: IRequestedAsset = {
  symbol: 'ETH',
  contractAddress: ZeroAddress,
  chainKey: ChainKey.ETHEREUM_MAINNET,
};
const USDT: IRequestedAsset = {
  symbol: 'USDT',
  contractAddress: USDT_ADDRESS.toLowerCase(),
  chainKey: ChainKey.ETHEREUM_MAINNET,
};
const DAI: IRequestedAsset = {
  symbol: 'DAI',
  contractAddress: DAI_ADDRESS,
  chainKey: ChainKey.ETHEREUM_MAINNET,
};
const GOERLI_ETH: IRequestedAsset = {
  symbol: 'ETH',
  contractAddress: ZeroAddress,
  chainKey: ChainKey.GOERLI,
};
const UNKNOWN: IRequestedAsset = {
  symbol: 'NOPE',
  contractAddress: '0x1111111111111111111111111111111111111111',
  chainKey: ChainKey.ETHEREUM_MAINNET,
};

const ETH_KEY: IAssetKey = { contractAddress: ZeroAddress, chainKey: ChainKey.ETHEREUM_MAINNET };
const ETH_KEY_ID = `ethereum_mainnet:${ZeroAddress}`;
const USDT_KEY_ID = `ethereum_mainnet:${USDT_ADDRESS.toLowerCase()}`;

const ticker = (id: string, priceUsd: number): ICoinTicker => ({
  id,
  symbol: id,
  name: id,
  image: null,
  priceUsd,
  percentChange24h: 1.5,
  priceChange24h: null,
  marketCap: null,
  totalVolume: null,
  high24h: null,
  low24h: null,
  lastUpdated: null,
});

const historyOf = (days: number): IChartHistory => ({
  prices: [[START_TIME.getTime(), days]],
});

// Page 1 prices every requested id; later pages are empty.
const pagedPrices = async (request: IPricesPageRequestDto): Promise<readonly ICoinTicker[]> =>
  request.page === 1
    ? request.tickerIds.map((id: string, index: number): ICoinTicker => ticker(id, index + 1))
    : [];

const createClientStub = (): PriceProviderClientStub => ({
  fetchCatalog: vi.fn().mockResolvedValue(CATALOG),
  fetchPricesPage: vi.fn().mockImplementation(pagedPrices),
  fetchChartHistory: vi
    .fn()
    .mockImplementation(
      async (request: IChartHistoryRequestDto): Promise<IChartHistory> => historyOf(request.days),
    ),
});

const createConfigStub = (overrides: Partial<AppConfigServiceStub> = {}): AppConfigService =>
  ({
    priceProviderRetryAttempts: 2,
    priceProviderRetryDelayMs: 0,
    pricesCacheLifetimeSec: 3600,
    dayChartHistoryCacheLifetimeSec: 3600,
    pricesMaxPages: 50,
    ...overrides,
  }) as unknown as AppConfigService;

const createFixture = (
  options: {
    readonly config?: Partial<AppConfigServiceStub>;
    readonly chartHistoryCache?: ChartHistoryCache;
    readonly metricsService?: MetricsService;
  } = {},
): FetcherFixture => {
  const client: PriceProviderClientStub = createClientStub();
  const config: AppConfigService = createConfigStub(options.config);
  const providerClient: IPriceProviderClient = client as unknown as IPriceProviderClient;
  const registry: TickerIdRegistry = new TickerIdRegistry(
    config,
    new EthereumAddressCodec(),
    providerClient,
  );
  const service: CoinTickersFetcherService = new CoinTickersFetcherService(
    config,
    registry,
    new PriceCache(),
    options.chartHistoryCache ?? new ChartHistoryCache(),
    providerClient,
    options.metricsService ?? null,
  );

  return { service, client };
};

describe('CoinTickersFetcherService', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
    vi.setSystemTime(START_TIME);
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  describe('fetchPrices', (): void => {
    it('stops paginating at the first empty page', async (): Promise<void> => {
      const { service, client } = createFixture();

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH, USDT]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(2);
      expect(client.fetchPricesPage).toHaveBeenNthCalledWith(1, {
        tickerIds: ['ethereum', 'tether'],
        currency: 'usd',
        page: 1,
      });
      expect(client.fetchPricesPage).toHaveBeenNthCalledWith(2, {
        tickerIds: ['ethereum', 'tether'],
        currency: 'usd',
        page: 2,
      });
      expect([...prices.keys()].sort()).toEqual([ETH_KEY_ID, USDT_KEY_ID].sort());
      expect(prices.get(USDT_KEY_ID)?.id).toBe('tether');
    });

    it('returns the memoized map for the same ids within the lifetime', async (): Promise<void> => {
      const { service, client } = createFixture();

      const first: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH, USDT]);
      vi.setSystemTime(START_TIME.getTime() + ONE_HOUR_MS);
      const second: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([USDT, ETH]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(2);
      expect(second).toEqual(first);
    });

    it('refetches the same ids once the lifetime has passed', async (): Promise<void> => {
      const { service, client } = createFixture();

      await service.fetchPrices([ETH, USDT]);
      vi.setSystemTime(START_TIME.getTime() + ONE_HOUR_MS + 1);
      await service.fetchPrices([ETH, USDT]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(4);
    });

    it('refetches immediately when the resolved id set changes', async (): Promise<void> => {
      const { service, client } = createFixture();

      await service.fetchPrices([ETH, USDT]);
      await service.fetchPrices([ETH, USDT, DAI]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(4);
      expect(client.fetchPricesPage).toHaveBeenNthCalledWith(3, {
        tickerIds: ['ethereum', 'tether', 'dai'],
        currency: 'usd',
        page: 1,
      });
    });

    it('keeps earlier snapshots for assets no longer requested', async (): Promise<void> => {
      const { service } = createFixture();

      await service.fetchPrices([ETH, USDT]);
      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH]);

      expect(prices.has(USDT_KEY_ID)).toBe(true);
      expect(prices.size).toBe(2);
    });

    it('fans one ticker out to every asset key resolved to it', async (): Promise<void> => {
      const { service, client } = createFixture();

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices({
        [ChainKey.ETHEREUM_MAINNET]: [ETH],
        [ChainKey.GOERLI]: [GOERLI_ETH],
      });

      expect(client.fetchPricesPage).toHaveBeenNthCalledWith(1, {
        tickerIds: ['ethereum'],
        currency: 'usd',
        page: 1,
      });
      expect(prices.get(ETH_KEY_ID)?.id).toBe('ethereum');
      expect(prices.get(`goerli:${ZeroAddress}`)?.id).toBe('ethereum');
    });

    it('drops assets that do not resolve', async (): Promise<void> => {
      const { service, client } = createFixture();

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([UNKNOWN, USDT]);

      expect(client.fetchPricesPage).toHaveBeenNthCalledWith(1, {
        tickerIds: ['tether'],
        currency: 'usd',
        page: 1,
      });
      expect([...prices.keys()]).toEqual([USDT_KEY_ID]);
    });

    it('makes no page request when nothing resolves', async (): Promise<void> => {
      const { service, client } = createFixture();

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([UNKNOWN]);

      expect(client.fetchPricesPage).not.toHaveBeenCalled();
      expect(prices.size).toBe(0);
    });

    it('rejects a concurrent call immediately', async (): Promise<void> => {
      const metricsService: MetricsService = new MetricsService();
      const { service, client } = createFixture({ metricsService });
      let releaseCatalog: (value: readonly ICatalogEntry[]) => void = (): void => undefined;
      client.fetchCatalog.mockReturnValue(
        new Promise<readonly ICatalogEntry[]>((resolve): void => {
          releaseCatalog = resolve;
        }),
      );

      const first: Promise<ReadonlyMap<string, ICoinTicker>> = service.fetchPrices([ETH]);

      await expect(service.fetchPrices([USDT])).rejects.toBeInstanceOf(AlreadyFetchingPricesError);
      expect(client.fetchPricesPage).not.toHaveBeenCalled();

      releaseCatalog(CATALOG);
      await expect(first).resolves.toBeInstanceOf(Map);
      expect(await metricsService.getMetrics()).toContain('price_fetch_rejected_total 1');
    });

    it('accepts a new call once the previous one failed', async (): Promise<void> => {
      const client: PriceProviderClientStub = createClientStub();
      const config: AppConfigService = createConfigStub();
      const registry: TickerIdRegistry = new TickerIdRegistry(
        config,
        new EthereumAddressCodec(),
        client as unknown as IPriceProviderClient,
      );
      const getCatalog = vi
        .spyOn(registry, 'getCatalog')
        .mockRejectedValueOnce(new Error('catalog exploded'));
      const service: CoinTickersFetcherService = new CoinTickersFetcherService(
        config,
        registry,
        new PriceCache(),
        new ChartHistoryCache(),
        client as unknown as IPriceProviderClient,
      );

      await expect(service.fetchPrices([ETH])).rejects.toThrow('catalog exploded');
      await expect(service.fetchPrices([ETH])).resolves.toBeInstanceOf(Map);
      expect(getCatalog).toHaveBeenCalledTimes(2);
    });

    it('retries a failed page once and then treats it as empty', async (): Promise<void> => {
      const { service, client } = createFixture();
      client.fetchPricesPage.mockRejectedValue(new Error('502'));

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(2);
      expect(prices.size).toBe(0);
    });

    it('recovers a page on retry', async (): Promise<void> => {
      const { service, client } = createFixture();
      client.fetchPricesPage.mockRejectedValueOnce(new Error('timeout'));

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(3);
      expect(prices.get(ETH_KEY_ID)?.priceUsd).toBe(1);
    });

    it('stops at the page cap', async (): Promise<void> => {
      const { service, client } = createFixture({ config: { pricesMaxPages: 3 } });
      client.fetchPricesPage.mockResolvedValue([ticker('ethereum', 10)]);

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH]);

      expect(client.fetchPricesPage).toHaveBeenCalledTimes(3);
      expect(prices.get(ETH_KEY_ID)?.priceUsd).toBe(10);
    });

    it('lets a later page win on key collision', async (): Promise<void> => {
      const { service, client } = createFixture();
      client.fetchPricesPage
        .mockResolvedValueOnce([ticker('ethereum', 10)])
        .mockResolvedValueOnce([ticker('ethereum', 11)])
        .mockResolvedValueOnce([]);

      const prices: ReadonlyMap<string, ICoinTicker> = await service.fetchPrices([ETH]);

      expect(prices.get(ETH_KEY_ID)?.priceUsd).toBe(11);
    });
  });

  describe('fetchChartHistory', (): void => {
    it('fails with AssetNotPricedError when the asset has no price', async (): Promise<void> => {
      const { service, client } = createFixture();

      await expect(
        service.fetchChartHistory(false, ChartHistoryPeriod.DAY, ETH_KEY),
      ).rejects.toMatchObject({ name: 'AssetNotPricedError', assetKeyId: ETH_KEY_ID });
      expect(client.fetchChartHistory).not.toHaveBeenCalled();
    });

    it('serves a day series from cache for one hour, then refetches', async (): Promise<void> => {
      const { service, client } = createFixture();
      await service.fetchPrices([ETH]);

      const first: IChartHistory = await service.fetchChartHistory(
        false,
        ChartHistoryPeriod.DAY,
        ETH_KEY,
      );
      vi.setSystemTime(START_TIME.getTime() + ONE_HOUR_MS);
      const second: IChartHistory = await service.fetchChartHistory(
        false,
        ChartHistoryPeriod.DAY,
        ETH_KEY,
      );

      expect(second).toBe(first);
      expect(client.fetchChartHistory).toHaveBeenCalledTimes(1);

      vi.setSystemTime(START_TIME.getTime() + ONE_HOUR_MS + 1);
      await service.fetchChartHistory(false, ChartHistoryPeriod.DAY, ETH_KEY);

      expect(client.fetchChartHistory).toHaveBeenCalledTimes(2);
      expect(client.fetchChartHistory).toHaveBeenLastCalledWith({
        tickerId: 'ethereum',
        currency: 'usd',
        days: 1,
      });
    });

    it('never expires a year series', async (): Promise<void> => {
      const { service, client } = createFixture();
      await service.fetchPrices([ETH]);

      await service.fetchChartHistory(false, ChartHistoryPeriod.YEAR, ETH_KEY);
      vi.setSystemTime(START_TIME.getTime() + 2 * 365 * 24 * ONE_HOUR_MS);
      await service.fetchChartHistory(false, ChartHistoryPeriod.YEAR, ETH_KEY);

      expect(client.fetchChartHistory).toHaveBeenCalledTimes(1);
    });

    it('bypasses the cache when forced', async (): Promise<void> => {
      const { service, client } = createFixture();
      await service.fetchPrices([ETH]);

      await service.fetchChartHistory(false, ChartHistoryPeriod.WEEK, ETH_KEY);
      await service.fetchChartHistory(true, ChartHistoryPeriod.WEEK, ETH_KEY);

      expect(client.fetchChartHistory).toHaveBeenCalledTimes(2);
    });

    it('never caches an empty series', async (): Promise<void> => {
      const { service, client } = createFixture();
      client.fetchChartHistory.mockResolvedValue(EMPTY_CHART_HISTORY);
      await service.fetchPrices([ETH]);

      const first: IChartHistory = await service.fetchChartHistory(
        false,
        ChartHistoryPeriod.MONTH,
        ETH_KEY,
      );
      await service.fetchChartHistory(false, ChartHistoryPeriod.MONTH, ETH_KEY);

      expect(first).toBe(EMPTY_CHART_HISTORY);
      expect(client.fetchChartHistory).toHaveBeenCalledTimes(2);
    });

    it('soft-fails to an empty series after one retry', async (): Promise<void> => {
      const { service, client } = createFixture();
      client.fetchChartHistory.mockRejectedValue(new Error('503'));
      await service.fetchPrices([ETH]);

      const history: IChartHistory = await service.fetchChartHistory(
        false,
        ChartHistoryPeriod.DAY,
        ETH_KEY,
      );

      expect(history).toBe(EMPTY_CHART_HISTORY);
      expect(client.fetchChartHistory).toHaveBeenCalledTimes(2);
    });

    it('raises FetchChartHistoryError when the lookup fails twice', async (): Promise<void> => {
      const chartHistoryCache: ChartHistoryCache = new ChartHistoryCache();
      const lookup = vi.spyOn(chartHistoryCache, 'get').mockImplementation((): never => {
        throw new Error('cache corrupted');
      });
      const { service } = createFixture({ chartHistoryCache });
      await service.fetchPrices([ETH]);

      await expect(
        service.fetchChartHistory(false, ChartHistoryPeriod.DAY, ETH_KEY),
      ).rejects.toBeInstanceOf(FetchChartHistoryError);
      expect(lookup).toHaveBeenCalledTimes(2);
    });

    it('recovers when the second outer attempt succeeds', async (): Promise<void> => {
      const chartHistoryCache: ChartHistoryCache = new ChartHistoryCache();
      vi.spyOn(chartHistoryCache, 'get').mockImplementationOnce((): never => {
        throw new Error('cache corrupted');
      });
      const { service } = createFixture({ chartHistoryCache });
      await service.fetchPrices([ETH]);

      const history: IChartHistory = await service.fetchChartHistory(
        false,
        ChartHistoryPeriod.WEEK,
        ETH_KEY,
      );

      expect(history).toEqual(historyOf(7));
    });
  });

  describe('fetchChartHistories', (): void => {
    it('returns all five periods in period order', async (): Promise<void> => {
      const { service, client } = createFixture();
      await service.fetchPrices([ETH]);

      const histories: readonly IChartHistory[] = await service.fetchChartHistories(ETH_KEY);

      expect(histories).toEqual([
        historyOf(1),
        historyOf(7),
        historyOf(30),
        historyOf(90),
        historyOf(365),
      ]);
      expect(client.fetchChartHistory).toHaveBeenCalledTimes(5);
    });

    it('rejects when the asset has no price', async (): Promise<void> => {
      const { service } = createFixture();

      await expect(service.fetchChartHistories(ETH_KEY)).rejects.toBeInstanceOf(
        AssetNotPricedError,
      );
    });
  });
});
