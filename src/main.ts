import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  app.enableShutdownHooks();

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, priceProvider=${appConfigService.priceProviderApiBaseUrl}, pricesCacheLifetimeSec=${String(appConfigService.pricesCacheLifetimeSec)}, metricsEnabled=${String(appConfigService.metricsEnabled)}`,
  );
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Token Price Service API')
    .setDescription('USD prices and chart history for multi-chain wallet tokens')
    .setVersion(appConfigService.appVersion)
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(appConfigService.port);
  logger.log(`Token price service is listening on port ${String(appConfigService.port)}.`);
};

void bootstrap();
