import { Module } from '@nestjs/common';

import { PricesController } from './controllers/prices.controller';
import { PricesModule } from '../prices/prices.module';

@Module({
  imports: [PricesModule],
  controllers: [PricesController],
})
export class ApiModule {}
