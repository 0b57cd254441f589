import type { ICatalogEntry, IChartHistory, ICoinTicker } from './token-pricing.interfaces';

export const PRICE_PROVIDER_CLIENT: unique symbol = Symbol('PRICE_PROVIDER_CLIENT');

export const QUOTE_CURRENCY = 'usd';

export enum PriceProviderEndpoint {
  CATALOG = 'catalog',
  PRICES = 'prices',
  HISTORY = 'history',
}

export interface IPricesPageRequestDto {
  readonly tickerIds: readonly string[];
  readonly currency: string;
  readonly page: number;
}

export interface IChartHistoryRequestDto {
  readonly tickerId: string;
  readonly currency: string;
  readonly days: number;
}

// Every method performs exactly one request and throws on transport or decode failure.
export interface IPriceProviderClient {
  fetchCatalog(): Promise<readonly ICatalogEntry[]>;
  fetchPricesPage(request: IPricesPageRequestDto): Promise<readonly ICoinTicker[]>;
  fetchChartHistory(request: IChartHistoryRequestDto): Promise<IChartHistory>;
}
