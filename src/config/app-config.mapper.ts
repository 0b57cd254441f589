import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapPriceProviderConfig(parsedEnv),
  ...mapPriceCacheConfig(parsedEnv),
  ...mapRateLimitConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'appVersion' | 'nodeEnv' | 'port' | 'logLevel' | 'metricsEnabled'> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
});

const mapPriceProviderConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'priceProviderApiBaseUrl'
  | 'priceProviderApiKey'
  | 'priceProviderTimeoutMs'
  | 'priceProviderRetryAttempts'
  | 'priceProviderRetryDelayMs'
> => ({
  priceProviderApiBaseUrl: trimTrailingSlash(parsedEnv.PRICE_PROVIDER_API_BASE_URL),
  priceProviderApiKey: parsedEnv.PRICE_PROVIDER_API_KEY ?? null,
  priceProviderTimeoutMs: parsedEnv.PRICE_PROVIDER_TIMEOUT_MS,
  priceProviderRetryAttempts: parsedEnv.PRICE_PROVIDER_RETRY_ATTEMPTS,
  priceProviderRetryDelayMs: parsedEnv.PRICE_PROVIDER_RETRY_DELAY_MS,
});

const mapPriceCacheConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  'pricesCacheLifetimeSec' | 'dayChartHistoryCacheLifetimeSec' | 'pricesPageSize' | 'pricesMaxPages'
> => ({
  pricesCacheLifetimeSec: parsedEnv.PRICES_CACHE_LIFETIME_SEC,
  dayChartHistoryCacheLifetimeSec: parsedEnv.DAY_CHART_HISTORY_CACHE_LIFETIME_SEC,
  pricesPageSize: parsedEnv.PRICES_PAGE_SIZE,
  pricesMaxPages: parsedEnv.PRICES_MAX_PAGES,
});

const mapRateLimitConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'rateLimitPriceProviderMinTimeMs'
  | 'rateLimitPriceProviderMaxConcurrent'
  | 'rateLimitPriceHistoryMinTimeMs'
  | 'rateLimitPriceHistoryMaxConcurrent'
> => ({
  rateLimitPriceProviderMinTimeMs: parsedEnv.RATE_LIMIT_PRICE_PROVIDER_MIN_TIME_MS,
  rateLimitPriceProviderMaxConcurrent: parsedEnv.RATE_LIMIT_PRICE_PROVIDER_MAX_CONCURRENT,
  rateLimitPriceHistoryMinTimeMs: parsedEnv.RATE_LIMIT_PRICE_HISTORY_MIN_TIME_MS,
  rateLimitPriceHistoryMaxConcurrent: parsedEnv.RATE_LIMIT_PRICE_HISTORY_MAX_CONCURRENT,
});

const trimTrailingSlash = (rawValue: string): string => {
  return rawValue.endsWith('/') ? rawValue.slice(0, -1) : rawValue;
};
