import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { ApiModule } from './modules/api/api.module';
import { PricesModule } from './modules/prices/prices.module';
import { ObservabilityModule } from './observability/observability.module';
import { RateLimitingModule } from './rate-limiting/rate-limiting.module';

@Module({
  imports: [
    ConfigModule,
    RateLimitingModule,
    ObservabilityModule,
    PricesModule,
    ApiModule,
    HealthModule,
  ],
})
export class AppModule {}
