export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly priceProviderApiBaseUrl: string;
  readonly priceProviderApiKey: string | null;
  readonly priceProviderTimeoutMs: number;
  readonly priceProviderRetryAttempts: number;
  readonly priceProviderRetryDelayMs: number;
  readonly pricesCacheLifetimeSec: number;
  readonly dayChartHistoryCacheLifetimeSec: number;
  readonly pricesPageSize: number;
  readonly pricesMaxPages: number;
  readonly metricsEnabled: boolean;
  readonly rateLimitPriceProviderMinTimeMs: number;
  readonly rateLimitPriceProviderMaxConcurrent: number;
  readonly rateLimitPriceHistoryMinTimeMs: number;
  readonly rateLimitPriceHistoryMaxConcurrent: number;
};
