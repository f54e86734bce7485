/**
 * Interface for hourly statistics storage
 * Provides database-agnostic access to the buckets and watermark of each series
 */

import { Bucket, SeriesState } from '../../../aggregation/models/series.model';

export interface IStatisticsDatabase {
  /**
   * Loads the watermark of a series and every bucket from the watermark hour onwards.
   * The bucket at the watermark itself is included so energy series can continue their
   * cumulative chain. Without a watermark every stored bucket is returned.
   */
  loadState(seriesId: string): Promise<SeriesState>;

  /**
   * Upserts buckets by (seriesId, hourStart) and raises the watermark in one batch.
   * A watermark lower than the stored one is ignored.
   * @throws PersistError when the batch could not be written
   */
  merge(seriesId: string, buckets: Bucket[], watermark: Date | null): Promise<void>;

  /**
   * Buckets with from <= hourStart < to, ordered by hourStart
   */
  getStatistics(seriesId: string, from: Date, to: Date): Promise<Bucket[]>;

  getWatermark(seriesId: string): Promise<Date | null>;
}
