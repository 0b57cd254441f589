import { Global, Module } from '@nestjs/common';

import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';

// One limiter set per process: every provider call shares the same budgets.
@Global()
@Module({
  providers: [BottleneckRateLimiterService],
  exports: [BottleneckRateLimiterService],
})
export class RateLimitingModule {}
