import { Module } from '@nestjs/common';
import { AggregatorService } from './aggregator.service';
import { LoggingService } from '../common/logging.service';

@Module({
  providers: [AggregatorService, LoggingService],
  exports: [AggregatorService]
})
export class AggregationModule {}
