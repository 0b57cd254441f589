import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';

import { MetricsService } from './metrics.service';
import { getAllCacheStats } from '../common/utils/cache';
import { AppConfigService } from '../config/app-config.service';
import type { ILimiterMetrics } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const COLLECT_INTERVAL_MS = 10_000;

// Limiter and cache state is pulled, not pushed, so it is copied into gauges on a timer.
@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private timer: NodeJS.Timeout | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('metrics_collector_disabled');
      return;
    }

    this.collect();
    this.timer = setInterval((): void => this.collect(), COLLECT_INTERVAL_MS);
    this.timer.unref();
    this.logger.log(`metrics_collector_started intervalMs=${String(COLLECT_INTERVAL_MS)}`);
  }

  public onModuleDestroy(): void {
    if (this.timer === null) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  public collect(): void {
    for (const key of this.rateLimiterService.getAllKeys()) {
      const limiter: ILimiterMetrics = this.rateLimiterService.getMetrics(key);
      this.metricsService.rateLimitQueueSize.set({ limiter: key }, limiter.queueSize);
      this.metricsService.rateLimitRunning.set({ limiter: key }, limiter.running);
      this.metricsService.rateLimitFailedTotal.set({ limiter: key }, limiter.failed);
    }

    for (const [cache, stats] of getAllCacheStats()) {
      this.metricsService.cacheKeys.set({ cache }, stats.keys);
      this.metricsService.cacheHitsTotal.set({ cache }, stats.hits);
      this.metricsService.cacheMissesTotal.set({ cache }, stats.misses);
    }
  }
}
