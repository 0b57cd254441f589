import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';
import { assertPriceProviderConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertPriceProviderConfig(parsedEnv);
    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get priceProviderApiBaseUrl(): string {
    return this.config.priceProviderApiBaseUrl;
  }

  public get priceProviderApiKey(): string | null {
    return this.config.priceProviderApiKey;
  }

  public get priceProviderTimeoutMs(): number {
    return this.config.priceProviderTimeoutMs;
  }

  public get priceProviderRetryAttempts(): number {
    return this.config.priceProviderRetryAttempts;
  }

  public get priceProviderRetryDelayMs(): number {
    return this.config.priceProviderRetryDelayMs;
  }

  public get pricesCacheLifetimeSec(): number {
    return this.config.pricesCacheLifetimeSec;
  }

  public get dayChartHistoryCacheLifetimeSec(): number {
    return this.config.dayChartHistoryCacheLifetimeSec;
  }

  public get pricesPageSize(): number {
    return this.config.pricesPageSize;
  }

  public get pricesMaxPages(): number {
    return this.config.pricesMaxPages;
  }

  public get rateLimitPriceProviderMinTimeMs(): number {
    return this.config.rateLimitPriceProviderMinTimeMs;
  }

  public get rateLimitPriceProviderMaxConcurrent(): number {
    return this.config.rateLimitPriceProviderMaxConcurrent;
  }

  public get rateLimitPriceHistoryMinTimeMs(): number {
    return this.config.rateLimitPriceHistoryMinTimeMs;
  }

  public get rateLimitPriceHistoryMaxConcurrent(): number {
    return this.config.rateLimitPriceHistoryMaxConcurrent;
  }
}
