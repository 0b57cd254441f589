import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';
import { HEALTH_RESULT_SCHEMA } from '../modules/api/swagger/api-schemas';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Service liveness and cache statistics' })
  @ApiResponse({ status: 200, description: 'Health status', schema: HEALTH_RESULT_SCHEMA })
  public getHealthStatus(): AppHealthStatus {
    return this.healthService.getHealthStatus();
  }
}
