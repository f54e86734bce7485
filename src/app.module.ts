import { Logger, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { MongooseModule } from '@nestjs/mongoose';
import { AppController } from './app.controller';
import { IngestionModule } from './ingestion/ingestion.module';
import { LoggingService } from './common/logging.service';
import { ApiKeyMiddleware } from './common/middleware/api-key.middleware';
import { DatabaseModule } from './common/database/database.module';
import { DatabaseType, isDatabaseType } from './common/database/database.constants';
import { Constants } from './constants';

const configuredType = Constants.DATABASE.TYPE;
const databaseType = isDatabaseType(configuredType) ? configuredType : DatabaseType.MONGODB;

// Log database configuration BEFORE module initialization
const logger = new Logger('AppModule');
logger.log(`=== Database Configuration ===`);
logger.log(`DATABASE_TYPE: ${process.env.DATABASE_TYPE || 'not set (will use MongoDB)'}`);
if (!isDatabaseType(configuredType)) {
  logger.warn(`Unsupported DATABASE_TYPE ${configuredType}, falling back to MongoDB`);
}
if (databaseType === DatabaseType.COUCHDB) {
  logger.log(`CouchDB URL: ${Constants.DATABASE.COUCHDB_URL}`);
} else {
  logger.log(`MongoDB URI: ${Constants.DATABASE.MONGODB_URI}`);
}
logger.log(`===============================`);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true
    }),
    ...(databaseType === DatabaseType.MONGODB
      ? [
          MongooseModule.forRoot(Constants.DATABASE.MONGODB_URI, {
            maxPoolSize: 5,
            serverSelectionTimeoutMS: 5000,
            socketTimeoutMS: 25000,
            retryWrites: true,
            retryReads: true
          })
        ]
      : []),
    DatabaseModule.forRoot(databaseType, { couchdbUrl: Constants.DATABASE.COUCHDB_URL }),
    ScheduleModule.forRoot(),
    IngestionModule
  ],
  controllers: [AppController],
  providers: [LoggingService]
})
export class AppModule implements NestModule {
  public configure(consumer: MiddlewareConsumer): void {
    // Apply API key middleware to all routes except health check
    consumer.apply(ApiKeyMiddleware).exclude('health').forRoutes('*');
  }
}
