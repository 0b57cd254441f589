import type { ICacheStats } from '../common/utils/cache';

export type AppHealthStatus = {
  readonly status: 'ok';
  readonly version: string;
  readonly uptimeSec: number;
  readonly caches: Readonly<Record<string, ICacheStats>>;
};
