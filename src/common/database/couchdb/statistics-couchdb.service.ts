/**
 * CouchDB implementation of the statistics store
 *
 * CouchDB has no multi-document transaction: merge writes the buckets with one
 * _bulk_docs request and only then the watermark. A partially applied batch raises
 * PersistError and leaves the watermark where it was, so the next run fetches the
 * same window again and re-merges the same buckets.
 */

import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import * as Nano from 'nano';
import _ from 'lodash';
import { LoggingService } from '../../logging.service';
import { errorMessage, PersistError } from '../../errors/ingestion.errors';
import { Bucket, SeriesState } from '../../../aggregation/models/series.model';
import { DATABASE_TOKENS } from '../database.constants';
import { IStatisticsDatabase } from '../interfaces/statistics-database.interface';
import { StoredStatistic, toBucket, toStoredStatistic } from '../statistic.mapper';

export const STATISTICS_DB_NAME = 'hourly_statistics';
export const WATERMARKS_DB_NAME = 'series_watermarks';

interface StatisticDocument extends Omit<StoredStatistic, 'hourStart'> {
  _id: string;
  _rev?: string;
  type: 'hourly-statistic';
  hourStart: string;
}

interface WatermarkDocument {
  _id: string;
  _rev?: string;
  type: 'series-watermark';
  seriesId: string;
  watermark: string | null;
}

// Sorts after every ISO timestamp
const KEY_END = '\ufff0';

@Injectable()
export class StatisticsCouchDBService implements IStatisticsDatabase, OnModuleInit {
  private readonly context = StatisticsCouchDBService.name;
  private readonly statistics: Nano.DocumentScope<StatisticDocument>;
  private readonly watermarks: Nano.DocumentScope<WatermarkDocument>;

  constructor(
    @Inject(DATABASE_TOKENS.COUCHDB_CONNECTION) private readonly nano: Nano.ServerScope,
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {
    this.statistics = this.nano.use<StatisticDocument>(STATISTICS_DB_NAME);
    this.watermarks = this.nano.use<WatermarkDocument>(WATERMARKS_DB_NAME);
  }

  public async onModuleInit(): Promise<void> {
    await this.ensureDatabase(STATISTICS_DB_NAME);
    await this.ensureDatabase(WATERMARKS_DB_NAME);
  }

  public async loadState(seriesId: string): Promise<SeriesState> {
    const watermark = await this.getWatermark(seriesId);
    const buckets = await this.listRange(
      seriesId,
      statisticId(seriesId, watermark ? watermark.toISOString() : ''),
      statisticId(seriesId, KEY_END),
      true
    );

    return { watermark, buckets };
  }

  public async getWatermark(seriesId: string): Promise<Date | null> {
    const document = await this.findWatermark(seriesId);
    return document?.watermark ? new Date(document.watermark) : null;
  }

  public async merge(seriesId: string, buckets: Bucket[], watermark: Date | null): Promise<void> {
    try {
      if (buckets.length > 0) {
        await this.writeBuckets(seriesId, buckets);
      }
      if (watermark) {
        await this.raiseWatermark(seriesId, watermark);
      }
    } catch (error) {
      if (error instanceof PersistError) {
        throw error;
      }
      throw new PersistError(seriesId, errorMessage(error), { cause: error });
    }

    this.logger.debug(
      `Merged ${buckets.length} buckets for ${seriesId}, watermark ${watermark?.toISOString() ?? 'unchanged'}`,
      this.context
    );
  }

  public async getStatistics(seriesId: string, from: Date, to: Date): Promise<Bucket[]> {
    return this.listRange(
      seriesId,
      statisticId(seriesId, from.toISOString()),
      statisticId(seriesId, to.toISOString()),
      false
    );
  }

  private async listRange(seriesId: string, startkey: string, endkey: string, inclusiveEnd: boolean): Promise<Bucket[]> {
    const response = await this.statistics.list({
      startkey,
      endkey,
      inclusive_end: inclusiveEnd,
      include_docs: true
    });

    const buckets: Bucket[] = [];
    for (const row of response.rows) {
      // Ids of another series may share the key prefix
      if (row.doc && row.doc.type === 'hourly-statistic' && row.doc.seriesId === seriesId) {
        buckets.push(toBucket({ ...row.doc, hourStart: new Date(row.doc.hourStart) }));
      }
    }
    return buckets;
  }

  private async writeBuckets(seriesId: string, buckets: Bucket[]): Promise<void> {
    const ids = buckets.map((bucket) => statisticId(seriesId, bucket.hourStart.toISOString()));
    const existing = await this.statistics.list({ keys: ids });

    const revisions = new Map<string, string>();
    for (const row of existing.rows) {
      if (row.value?.rev) {
        revisions.set(row.key, row.value.rev);
      }
    }

    const docs: StatisticDocument[] = buckets.map((bucket, index) => {
      const record = toStoredStatistic(bucket);
      const document: StatisticDocument = {
        ...record,
        _id: ids[index],
        type: 'hourly-statistic',
        hourStart: record.hourStart.toISOString()
      };
      const rev = revisions.get(ids[index]);
      if (rev) {
        document._rev = rev;
      }
      return document;
    });

    const results = await this.statistics.bulk({ docs });
    const failures = results.filter((result) => result.error);
    if (failures.length > 0) {
      const [first] = failures;
      const detail = _.compact([first.id, first.error, first.reason]).join(' ');
      throw new PersistError(seriesId, `${failures.length} of ${docs.length} bucket writes failed (${detail})`);
    }
  }

  private async raiseWatermark(seriesId: string, watermark: Date): Promise<void> {
    const current = await this.findWatermark(seriesId);
    if (current?.watermark && new Date(current.watermark).getTime() >= watermark.getTime()) {
      return;
    }

    const document: WatermarkDocument = {
      _id: seriesId,
      type: 'series-watermark',
      seriesId,
      watermark: watermark.toISOString()
    };
    if (current?._rev) {
      document._rev = current._rev;
    }
    await this.watermarks.insert(document);
  }

  private async findWatermark(seriesId: string): Promise<WatermarkDocument | null> {
    try {
      return await this.watermarks.get(seriesId);
    } catch (error) {
      if (isStatus(error, 404)) {
        return null;
      }
      throw error;
    }
  }

  private async ensureDatabase(name: string): Promise<void> {
    try {
      await this.nano.db.get(name);
    } catch (error) {
      if (!isStatus(error, 404)) {
        throw error;
      }
      try {
        await this.nano.db.create(name);
        this.logger.log(`Created CouchDB database ${name}`, this.context);
      } catch (createError) {
        // Created concurrently by another instance
        if (!isStatus(createError, 412)) {
          throw createError;
        }
      }
    }
  }
}

function statisticId(seriesId: string, hourStartIso: string): string {
  return `${seriesId}:${hourStartIso}`;
}

function isStatus(error: unknown, statusCode: number): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'statusCode') === statusCode;
}
