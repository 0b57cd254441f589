import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds for price provider latency distribution
/* eslint-disable no-magic-numbers */
const PROVIDER_DURATION_BUCKETS: number[] = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly priceProviderRequestsTotal: Counter;
  public readonly priceProviderRequestDurationSeconds: Histogram;
  public readonly priceCacheLookupsTotal: Counter;
  public readonly priceFetchRejectedTotal: Counter;
  public readonly rateLimitQueueSize: Gauge;
  public readonly rateLimitRunning: Gauge;
  public readonly rateLimitFailedTotal: Gauge;
  public readonly cacheKeys: Gauge;
  public readonly cacheHitsTotal: Gauge;
  public readonly cacheMissesTotal: Gauge;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.priceProviderRequestsTotal = new Counter({
      name: 'price_provider_requests_total',
      help: 'Total number of price provider requests',
      labelNames: ['endpoint', 'status'] as const,
      registers: [this.registry],
    });

    this.priceProviderRequestDurationSeconds = new Histogram({
      name: 'price_provider_request_duration_seconds',
      help: 'Price provider request duration in seconds',
      labelNames: ['endpoint'] as const,
      buckets: PROVIDER_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.priceCacheLookupsTotal = new Counter({
      name: 'price_cache_lookups_total',
      help: 'Price and chart history cache lookups by outcome',
      labelNames: ['cache', 'result'] as const,
      registers: [this.registry],
    });

    this.priceFetchRejectedTotal = new Counter({
      name: 'price_fetch_rejected_total',
      help: 'Price refreshes rejected because another refresh was in flight',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.rateLimitRunning = new Gauge({
      name: 'rate_limit_running',
      help: 'Provider requests currently executing under a limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.rateLimitFailedTotal = new Gauge({
      name: 'rate_limit_failed_total',
      help: 'Cumulative provider requests that failed under a limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.cacheKeys = new Gauge({
      name: 'cache_keys',
      help: 'Number of keys held by a registered cache',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheHitsTotal = new Gauge({
      name: 'cache_hits_total',
      help: 'Cumulative hits reported by a registered cache',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheMissesTotal = new Gauge({
      name: 'cache_misses_total',
      help: 'Cumulative misses reported by a registered cache',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
