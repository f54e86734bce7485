/**
 * Database module that provides database abstraction layer
 * Allows switching between MongoDB and CouchDB based on configuration
 */

import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import Nano from 'nano';

import { DATABASE_TOKENS, DatabaseType } from './database.constants';
import { StatisticsMongoDBService } from './mongodb/statistics-mongodb.service';
import { StatisticsCouchDBService } from './couchdb/statistics-couchdb.service';
import { HourlyStatistic, HourlyStatisticSchema } from '../schemas/hourly-statistic.schema';
import { SeriesWatermark, SeriesWatermarkSchema } from '../schemas/series-watermark.schema';
import { LoggingService } from '../logging.service';

export interface DatabaseModuleOptions {
  couchdbUrl?: string;
}

@Global()
@Module({})
export class DatabaseModule {
  /**
   * Creates a dynamic module based on the selected database type.
   * The MongoDB connection itself comes from MongooseModule.forRoot in the application module.
   */
  public static forRoot(databaseType: DatabaseType, options: DatabaseModuleOptions = {}): DynamicModule {
    const providers: Provider[] = [LoggingService];
    const imports: DynamicModule[] = [];

    if (databaseType === DatabaseType.MONGODB) {
      imports.push(
        MongooseModule.forFeature([
          { name: HourlyStatistic.name, schema: HourlyStatisticSchema },
          { name: SeriesWatermark.name, schema: SeriesWatermarkSchema }
        ])
      );
      providers.push({
        provide: DATABASE_TOKENS.STATISTICS_DATABASE,
        useClass: StatisticsMongoDBService
      });
    } else {
      providers.push(
        {
          provide: DATABASE_TOKENS.COUCHDB_CONNECTION,
          useValue: Nano(options.couchdbUrl || 'http://localhost:5984')
        },
        {
          provide: DATABASE_TOKENS.STATISTICS_DATABASE,
          useClass: StatisticsCouchDBService
        }
      );
    }

    return {
      module: DatabaseModule,
      imports,
      providers,
      exports: [DATABASE_TOKENS.STATISTICS_DATABASE]
    };
  }
}
