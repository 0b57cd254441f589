import { Injectable, Logger, Optional } from '@nestjs/common';
import type { z } from 'zod';

import {
  type CoinGeckoCatalogPayload,
  type CoinGeckoMarketChartPayload,
  type CoinGeckoMarketsPayload,
  coinGeckoCatalogSchema,
  coinGeckoMarketChartSchema,
  coinGeckoMarketsSchema,
} from './coingecko-price-provider.schemas';
import { PriceProviderRequestError } from '../../../common/errors/price-provider-request.error';
import {
  type IChartHistoryRequestDto,
  type IPriceProviderClient,
  type IPricesPageRequestDto,
  PriceProviderEndpoint,
} from '../../../common/interfaces/token-pricing/price-provider.interfaces';
import type {
  ChartHistoryPoint,
  ICatalogEntry,
  IChartHistory,
  ICoinTicker,
} from '../../../common/interfaces/token-pricing/token-pricing.interfaces';
import { EMPTY_CHART_HISTORY } from '../../../common/interfaces/token-pricing/token-pricing.interfaces';
import {
  RateLimitedWarningEmitter,
  type WarningDecision,
} from '../../../common/utils/logging/rate-limited-warning-emitter';
import { AppConfigService } from '../../../config/app-config.service';
import { MetricsService } from '../../../observability/metrics.service';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';
import { EthereumAddressCodec } from '../../address/ethereum/ethereum-address.codec';

const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
const RESPONSE_PREVIEW_MAX_LENGTH = 300;
const WARN_COOLDOWN_MS = 30_000;
const API_KEY_HEADER = 'x-cg-demo-api-key';

type EndpointRequest = {
  readonly endpoint: PriceProviderEndpoint;
  readonly url: URL;
  readonly limiterKey: LimiterKey;
  readonly priority: RequestPriority;
};

@Injectable()
export class CoinGeckoPriceProviderClient implements IPriceProviderClient {
  private readonly logger: Logger = new Logger(CoinGeckoPriceProviderClient.name);
  private readonly warningEmitter: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    WARN_COOLDOWN_MS,
  );

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly addressCodec: EthereumAddressCodec,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public async fetchCatalog(): Promise<readonly ICatalogEntry[]> {
    const url: URL = this.buildUrl('/coins/list');
    url.searchParams.set('include_platform', 'true');

    const payload: CoinGeckoCatalogPayload = await this.requestJson(
      {
        endpoint: PriceProviderEndpoint.CATALOG,
        url,
        limiterKey: LimiterKey.PRICE_PROVIDER,
        priority: RequestPriority.HIGH,
      },
      coinGeckoCatalogSchema,
    );

    return payload.map(
      (entry): ICatalogEntry => ({
        id: entry.id,
        symbol: entry.symbol,
        name: entry.name,
        platforms: this.mapPlatforms(entry.platforms ?? {}),
      }),
    );
  }

  public async fetchPricesPage(request: IPricesPageRequestDto): Promise<readonly ICoinTicker[]> {
    const url: URL = this.buildUrl('/coins/markets');
    url.searchParams.set('vs_currency', request.currency);
    url.searchParams.set('ids', request.tickerIds.join(','));
    url.searchParams.set('page', String(request.page));
    url.searchParams.set('per_page', String(this.appConfigService.pricesPageSize));
    url.searchParams.set('price_change_percentage', '24h');

    const payload: CoinGeckoMarketsPayload = await this.requestJson(
      {
        endpoint: PriceProviderEndpoint.PRICES,
        url,
        limiterKey: LimiterKey.PRICE_PROVIDER,
        priority: RequestPriority.NORMAL,
      },
      coinGeckoMarketsSchema,
    );

    const tickers: ICoinTicker[] = [];

    for (const market of payload) {
      if (market.current_price === null || market.current_price === undefined) {
        this.logger.debug(`coingecko_market_without_price id=${market.id}`);
        continue;
      }

      tickers.push({
        id: market.id,
        symbol: market.symbol,
        name: market.name,
        image: market.image ?? null,
        priceUsd: market.current_price,
        percentChange24h: market.price_change_percentage_24h ?? null,
        priceChange24h: market.price_change_24h ?? null,
        marketCap: market.market_cap ?? null,
        totalVolume: market.total_volume ?? null,
        high24h: market.high_24h ?? null,
        low24h: market.low_24h ?? null,
        lastUpdated: market.last_updated ?? null,
      });
    }

    return tickers;
  }

  public async fetchChartHistory(request: IChartHistoryRequestDto): Promise<IChartHistory> {
    const url: URL = this.buildUrl(`/coins/${encodeURIComponent(request.tickerId)}/market_chart`);
    url.searchParams.set('vs_currency', request.currency);
    url.searchParams.set('days', String(request.days));

    const payload: CoinGeckoMarketChartPayload = await this.requestJson(
      {
        endpoint: PriceProviderEndpoint.HISTORY,
        url,
        limiterKey: LimiterKey.PRICE_HISTORY,
        priority: RequestPriority.NORMAL,
      },
      coinGeckoMarketChartSchema,
    );

    if (payload.prices === null || payload.prices === undefined || payload.prices.length === 0) {
      return EMPTY_CHART_HISTORY;
    }

    return {
      prices: payload.prices.map(
        ([timestampMs, priceUsd]): ChartHistoryPoint => [timestampMs, priceUsd],
      ),
    };
  }

  private async requestJson<T>(request: EndpointRequest, schema: z.ZodType<T>): Promise<T> {
    const startedAtMs: number = Date.now();

    try {
      const payload: unknown = await this.rateLimiterService.schedule(
        request.limiterKey,
        async (): Promise<unknown> => this.fetchPayload(request),
        request.priority,
      );
      const parsed = schema.safeParse(payload);

      if (!parsed.success) {
        const firstIssue: string = parsed.error.issues[0]?.message ?? 'unknown issue';
        throw new PriceProviderRequestError(
          request.endpoint,
          `Unexpected ${request.endpoint} payload: ${firstIssue}`,
        );
      }

      this.recordRequest(request.endpoint, 'ok', startedAtMs);
      return parsed.data;
    } catch (error: unknown) {
      this.recordRequest(request.endpoint, 'error', startedAtMs);

      if (error instanceof PriceProviderRequestError) {
        throw error;
      }

      const errorMessage: string = error instanceof Error ? error.message : String(error);
      throw new PriceProviderRequestError(request.endpoint, errorMessage);
    }
  }

  private async fetchPayload(request: EndpointRequest): Promise<unknown> {
    const response: Response = await fetch(request.url, {
      method: 'GET',
      headers: this.buildHeaders(),
      signal: AbortSignal.timeout(this.appConfigService.priceProviderTimeoutMs),
    });

    if (response.status === HTTP_STATUS_TOO_MANY_REQUESTS) {
      this.warnWithCooldown(
        `coingecko_http_429:${request.endpoint}`,
        `coingecko_http_429 endpoint=${request.endpoint} path=${request.url.pathname}`,
      );
    }

    if (!response.ok) {
      const details: string = await this.readResponseDetails(response);
      throw new PriceProviderRequestError(
        request.endpoint,
        `CoinGecko HTTP ${String(response.status)}` + (details.length > 0 ? `: ${details}` : ''),
        response.status,
      );
    }

    return response.json();
  }

  private async readResponseDetails(response: Response): Promise<string> {
    try {
      const text: string = await response.text();
      return text.trim().slice(0, RESPONSE_PREVIEW_MAX_LENGTH);
    } catch {
      return '';
    }
  }

  private buildUrl(path: string): URL {
    return new URL(`${this.appConfigService.priceProviderApiBaseUrl}${path}`);
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { accept: 'application/json' };
    const apiKey: string | null = this.appConfigService.priceProviderApiKey;

    if (apiKey !== null) {
      headers[API_KEY_HEADER] = apiKey;
    }

    return headers;
  }

  private mapPlatforms(
    platforms: Readonly<Record<string, string | null>>,
  ): Readonly<Record<string, string>> {
    const mapped: Record<string, string> = {};

    for (const [platform, address] of Object.entries(platforms)) {
      // Non-EVM platforms carry addresses in other formats and are left out.
      const normalizedAddress: string | null = this.addressCodec.normalize(address ?? '');

      if (normalizedAddress !== null) {
        mapped[platform] = normalizedAddress;
      }
    }

    return mapped;
  }

  private recordRequest(
    endpoint: PriceProviderEndpoint,
    status: 'ok' | 'error',
    startedAtMs: number,
  ): void {
    if (this.metricsService === null) {
      return;
    }

    this.metricsService.priceProviderRequestsTotal.inc({ endpoint, status });
    this.metricsService.priceProviderRequestDurationSeconds.observe(
      { endpoint },
      (Date.now() - startedAtMs) / 1000,
    );
  }

  private warnWithCooldown(key: string, message: string): void {
    const decision: WarningDecision = this.warningEmitter.check(key);

    if (!decision.emit) {
      return;
    }

    const suffix: string =
      decision.suppressedSinceLast > 0 ? ` suppressed=${String(decision.suppressedSinceLast)}` : '';
    this.logger.warn(`${message}${suffix}`);
  }
}
