import { Controller, Get, Header, NotFoundException, Res } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { Response } from 'express';

import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';

@ApiExcludeController()
@Controller('metrics')
export class MetricsController {
  public constructor(
    private readonly metricsService: MetricsService,
    private readonly appConfigService: AppConfigService,
  ) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  public async getMetrics(@Res() response: Response): Promise<void> {
    if (!this.appConfigService.metricsEnabled) {
      throw new NotFoundException('Metrics are disabled.');
    }

    const metrics: string = await this.metricsService.getMetrics();
    response.set('Content-Type', this.metricsService.getContentType());
    response.end(metrics);
  }
}
