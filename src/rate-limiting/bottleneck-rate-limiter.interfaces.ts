// Catalog and markets pages go through PRICE_PROVIDER; market_chart has its own budget.
export enum LimiterKey {
  PRICE_PROVIDER = 'price_provider',
  PRICE_HISTORY = 'price_history',
}

// Bottleneck runs lower numbers first (0-9).
/* eslint-disable no-magic-numbers */
export enum RequestPriority {
  HIGH = 3,
  NORMAL = 5,
}
/* eslint-enable no-magic-numbers */

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
  readonly queueWarnThreshold: number;
}

export interface ILimiterMetrics {
  readonly queueSize: number;
  readonly running: number;
  readonly failed: number;
}
