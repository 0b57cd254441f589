import { Injectable } from '@nestjs/common';

import type { AppHealthStatus } from './health.types';
import { getAllCacheStats, type ICacheStats } from '../common/utils/cache';
import { AppConfigService } from '../config/app-config.service';

@Injectable()
export class HealthService {
  public constructor(private readonly appConfigService: AppConfigService) {}

  public getHealthStatus(): AppHealthStatus {
    const caches: Record<string, ICacheStats> = {};

    for (const [name, stats] of getAllCacheStats()) {
      caches[name] = stats;
    }

    return {
      status: 'ok',
      version: this.appConfigService.appVersion,
      uptimeSec: Math.floor(process.uptime()),
      caches,
    };
  }
}
