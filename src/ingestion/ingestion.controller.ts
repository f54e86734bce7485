import { Controller, Get, HttpCode, HttpException, HttpStatus, Inject, Param, Post, Query } from '@nestjs/common';
import { DATABASE_TOKENS } from '../common/database/database.constants';
import { IStatisticsDatabase } from '../common/database/interfaces/statistics-database.interface';
import { FetchError, NonMonotonicCumulativeSumError, PersistError } from '../common/errors/ingestion.errors';
import { DAY_MS } from '../common/utils/time.util';
import { Bucket, SeriesDefinition, SeriesKind } from '../aggregation/models/series.model';
import { IngestionService, SeriesNeedsAttentionError, UnknownSeriesError } from './ingestion.service';
import { InvalidSeriesConfigError } from './series-config.service';
import { RetryState, RunResponse, SeriesStatusDTO, StatisticDTO } from './models/ingestion.model';

const MAX_QUERY_DAYS = 366;

/**
 * Controller for the ingested series
 * Exposes their scheduling state and stored hourly statistics, and lets an operator
 * trigger or resume a run
 */
@Controller('series')
export class IngestionController {
  @Inject(IngestionService)
  private readonly ingestionService!: IngestionService;

  @Inject(DATABASE_TOKENS.STATISTICS_DATABASE)
  private readonly store!: IStatisticsDatabase;

  /**
   * Configured series with their run state and watermark
   */
  @Get()
  public async listSeries(): Promise<SeriesStatusDTO[]> {
    try {
      return await this.ingestionService.listSeries();
    } catch (error) {
      throw new HttpException('Failed to list series', HttpStatus.SERVICE_UNAVAILABLE);
    }
  }

  /**
   * Re-reads the series configuration
   */
  @Post('reload')
  @HttpCode(HttpStatus.OK)
  public reload(): SeriesDefinition[] {
    try {
      return this.ingestionService.reloadSeries();
    } catch (error) {
      if (error instanceof InvalidSeriesConfigError) {
        throw new HttpException(error.message, HttpStatus.BAD_REQUEST);
      }
      throw new HttpException('Failed to reload series configuration', HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  /**
   * Stored hourly statistics with from <= hourStart < to (default: the last 24 hours)
   * @param from - ISO date
   * @param to - ISO date
   */
  @Get(':id/statistics')
  public async getStatistics(
    @Param('id') seriesId: string,
    @Query('from') from?: string,
    @Query('to') to?: string
  ): Promise<StatisticDTO[]> {
    try {
      this.ingestionService.requireSeries(seriesId);

      const end = to ? new Date(to) : new Date();
      const start = from ? new Date(from) : new Date(end.getTime() - DAY_MS);
      if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
        throw new HttpException('Invalid from/to parameter. Use ISO 8601 dates.', HttpStatus.BAD_REQUEST);
      }
      if (start.getTime() >= end.getTime() || end.getTime() - start.getTime() > MAX_QUERY_DAYS * DAY_MS) {
        throw new HttpException(
          `from must be before to, at most ${MAX_QUERY_DAYS} days apart`,
          HttpStatus.BAD_REQUEST
        );
      }

      const buckets = await this.store.getStatistics(seriesId, start, end);
      return buckets.map((bucket) => this.convertToStatisticDTO(bucket));
    } catch (error) {
      throw this.toHttpException(error, 'Failed to get statistics');
    }
  }

  /**
   * Runs the series now; joins the current run when one is in progress
   */
  @Post(':id/run')
  @HttpCode(HttpStatus.OK)
  public async run(@Param('id') seriesId: string): Promise<RunResponse> {
    try {
      const outcome = await this.ingestionService.runNow(seriesId);
      if (!outcome.ok) {
        throw outcome.error;
      }
      return { success: true, report: outcome.report, timestamp: new Date().toISOString() };
    } catch (error) {
      throw this.toHttpException(error, 'Run failed');
    }
  }

  /**
   * Clears needs_attention so the series runs on the next tick
   */
  @Post(':id/resume')
  @HttpCode(HttpStatus.OK)
  public resume(@Param('id') seriesId: string): RunResponse {
    try {
      const state: RetryState = this.ingestionService.resume(seriesId);
      return { success: true, state, message: `Series ${seriesId} resumed`, timestamp: new Date().toISOString() };
    } catch (error) {
      throw this.toHttpException(error, 'Failed to resume series');
    }
  }

  private convertToStatisticDTO(bucket: Bucket): StatisticDTO {
    const base = {
      hourStart: bucket.hourStart.toISOString(),
      kind: bucket.kind,
      closed: bucket.closed,
      sampleCount: bucket.sampleCount,
      mean: bucket.mean
    };

    return bucket.kind === SeriesKind.POWER_DEMAND
      ? { ...base, min: bucket.min, max: bucket.max }
      : { ...base, sum: bucket.sum, cumulativeSum: bucket.cumulativeSum };
  }

  private toHttpException(error: unknown, fallback: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof UnknownSeriesError) {
      return new HttpException(error.message, HttpStatus.NOT_FOUND);
    }
    if (error instanceof SeriesNeedsAttentionError || error instanceof NonMonotonicCumulativeSumError) {
      return new HttpException(error.message, HttpStatus.CONFLICT);
    }
    if (error instanceof FetchError) {
      return new HttpException(error.message, error.transient ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.BAD_GATEWAY);
    }
    if (error instanceof PersistError) {
      return new HttpException(error.message, HttpStatus.SERVICE_UNAVAILABLE);
    }
    return new HttpException(fallback, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}
