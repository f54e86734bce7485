/**
 * MongoDB implementation of the statistics store
 * Buckets and watermark of a run are written in one transaction (requires a replica set)
 */

import { Inject, Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, FilterQuery, Model } from 'mongoose';
import { LoggingService } from '../../logging.service';
import { errorMessage, PersistError } from '../../errors/ingestion.errors';
import { MongoDbRetryUtil } from '../../utils/mongodb-retry.util';
import { Bucket, SeriesState } from '../../../aggregation/models/series.model';
import { HourlyStatistic, HourlyStatisticDocument } from '../../schemas/hourly-statistic.schema';
import { SeriesWatermark, SeriesWatermarkDocument } from '../../schemas/series-watermark.schema';
import { IStatisticsDatabase } from '../interfaces/statistics-database.interface';
import { toBucket, toStoredStatistic } from '../statistic.mapper';

@Injectable()
export class StatisticsMongoDBService implements IStatisticsDatabase {
  private readonly context = StatisticsMongoDBService.name;

  constructor(
    @InjectModel(HourlyStatistic.name)
    private readonly statisticModel: Model<HourlyStatisticDocument>,
    @InjectModel(SeriesWatermark.name)
    private readonly watermarkModel: Model<SeriesWatermarkDocument>,
    @InjectConnection()
    private readonly connection: Connection,
    @Inject(LoggingService)
    private readonly logger: LoggingService
  ) {}

  public async loadState(seriesId: string): Promise<SeriesState> {
    const watermark = await this.getWatermark(seriesId);

    const filter: FilterQuery<HourlyStatisticDocument> = { seriesId };
    if (watermark) {
      filter.hourStart = { $gte: watermark };
    }

    const buckets = await MongoDbRetryUtil.executeWithRetry(
      () => this.statisticModel.find(filter).sort({ hourStart: 1 }).lean().exec(),
      `Load statistics of ${seriesId}`,
      this.logger,
      this.context
    );

    return { watermark, buckets: buckets.map(toBucket) };
  }

  public async getWatermark(seriesId: string): Promise<Date | null> {
    const document = await MongoDbRetryUtil.executeWithRetry(
      () => this.watermarkModel.findOne({ seriesId }).lean().exec(),
      `Load watermark of ${seriesId}`,
      this.logger,
      this.context
    );

    return document?.watermark ?? null;
  }

  public async merge(seriesId: string, buckets: Bucket[], watermark: Date | null): Promise<void> {
    try {
      await this.connection.transaction(async (session) => {
        if (buckets.length > 0) {
          await this.statisticModel.bulkWrite(
            buckets.map((bucket) => ({
              replaceOne: {
                filter: { seriesId, hourStart: bucket.hourStart },
                replacement: toStoredStatistic(bucket),
                upsert: true
              }
            })),
            { session, ordered: true }
          );
        }

        if (watermark) {
          // $max only ever raises it; null sorts below any date
          await this.watermarkModel
            .updateOne({ seriesId }, { $max: { watermark } }, { session, upsert: true })
            .exec();
        }
      });
    } catch (error) {
      throw new PersistError(seriesId, errorMessage(error), { cause: error });
    }

    this.logger.debug(
      `Merged ${buckets.length} buckets for ${seriesId}, watermark ${watermark?.toISOString() ?? 'unchanged'}`,
      this.context
    );
  }

  public async getStatistics(seriesId: string, from: Date, to: Date): Promise<Bucket[]> {
    const documents = await MongoDbRetryUtil.executeWithRetry(
      () =>
        this.statisticModel
          .find({ seriesId, hourStart: { $gte: from, $lt: to } })
          .sort({ hourStart: 1 })
          .lean()
          .exec(),
      `Query statistics of ${seriesId}`,
      this.logger,
      this.context
    );

    return documents.map(toBucket);
  }
}
