import { Module } from '@nestjs/common';
import { MeteringApiService } from './metering-api.service';
import { LoggingService } from '../common/logging.service';

@Module({
  providers: [MeteringApiService, LoggingService],
  exports: [MeteringApiService]
})
export class MeteringModule {}
