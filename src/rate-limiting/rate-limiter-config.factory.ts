import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

const PRICE_PROVIDER_QUEUE_WARN_THRESHOLD = 10;
// Every period of every opened asset lands here.
const PRICE_HISTORY_QUEUE_WARN_THRESHOLD = 25;

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  return new Map<LimiterKey, IBottleneckConfig>([
    [
      LimiterKey.PRICE_PROVIDER,
      {
        minTime: config.rateLimitPriceProviderMinTimeMs,
        maxConcurrent: config.rateLimitPriceProviderMaxConcurrent,
        queueWarnThreshold: PRICE_PROVIDER_QUEUE_WARN_THRESHOLD,
      },
    ],
    [
      LimiterKey.PRICE_HISTORY,
      {
        minTime: config.rateLimitPriceHistoryMinTimeMs,
        maxConcurrent: config.rateLimitPriceHistoryMaxConcurrent,
        queueWarnThreshold: PRICE_HISTORY_QUEUE_WARN_THRESHOLD,
      },
    ],
  ]);
}
