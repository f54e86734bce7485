import { Module } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { IngestionController } from './ingestion.controller';
import { SeriesConfigService } from './series-config.service';
import { MeteringModule } from '../metering/metering.module';
import { AggregationModule } from '../aggregation/aggregation.module';
import { LoggingService } from '../common/logging.service';

@Module({
  imports: [MeteringModule, AggregationModule],
  providers: [IngestionService, SeriesConfigService, LoggingService],
  controllers: [IngestionController],
  exports: [IngestionService]
})
export class IngestionModule {}
