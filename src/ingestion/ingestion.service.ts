import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { LoggingService } from '../common/logging.service';
import { FetchError } from '../common/errors/ingestion.errors';
import { DATABASE_TOKENS } from '../common/database/database.constants';
import { IStatisticsDatabase } from '../common/database/interfaces/statistics-database.interface';
import { DAY_MS, HOUR_MS, hourStartOf } from '../common/utils/time.util';
import { Constants } from '../constants';
import { AggregatorService } from '../aggregation/aggregator.service';
import { Sample, SeriesDefinition } from '../aggregation/models/series.model';
import { MeteringApiService } from '../metering/metering-api.service';
import { RetryState, RunOutcome, RunReport, RunStatus, SeriesStatusDTO } from './models/ingestion.model';
import { RetryStateMachine } from './retry-state';
import { seriesFingerprint, SeriesConfigService } from './series-config.service';

export class UnknownSeriesError extends Error {
  constructor(public readonly seriesId: string) {
    super(`Unknown series ${seriesId}`);
    this.name = UnknownSeriesError.name;
  }
}

export class SeriesNeedsAttentionError extends Error {
  constructor(public readonly seriesId: string) {
    super(`Series ${seriesId} needs attention, resume it first`);
    this.name = SeriesNeedsAttentionError.name;
  }
}

/**
 * Periodically ingests every configured series
 *
 * A run loads the stored state of a series, fetches the samples after its watermark,
 * aggregates them and hands the changed buckets and the new watermark to the store in
 * one merge. A failed run persists nothing.
 *
 * Features:
 * - Checks every minute which series are due, series run concurrently
 * - At most one run per series; a trigger during a run joins it
 * - Transient failures are retried with exponential backoff
 * - Permanent failures park the series in needs_attention until resumed
 */
@Injectable()
export class IngestionService implements OnModuleInit {
  private readonly context = IngestionService.name;

  @Inject(LoggingService) private readonly logger!: LoggingService;
  @Inject(SeriesConfigService) private readonly seriesConfig!: SeriesConfigService;
  @Inject(MeteringApiService) private readonly meteringApi!: MeteringApiService;
  @Inject(AggregatorService) private readonly aggregator!: AggregatorService;
  @Inject(DATABASE_TOKENS.STATISTICS_DATABASE) private readonly store!: IStatisticsDatabase;

  private readonly states = new Map<string, RetryState>();
  private readonly inFlight = new Map<string, Promise<RunOutcome>>();
  private retry = new RetryStateMachine({ maxRetries: 5, initialDelayMs: 60000, maxDelayMs: 1800000 });
  private runTimeoutMs = 120000;
  private initialDaysToFetch = 180;

  /**
   * Module initialization
   */
  public onModuleInit(): void {
    this.retry = new RetryStateMachine({
      maxRetries: Constants.INGESTION.MAX_RETRIES,
      initialDelayMs: Constants.INGESTION.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: Constants.INGESTION.RETRY_MAX_DELAY_MS
    });
    this.runTimeoutMs = Constants.INGESTION.RUN_TIMEOUT_MS;
    this.initialDaysToFetch = Constants.INGESTION.INITIAL_DAYS_TO_FETCH;

    this.syncStates();
    this.logger.log(`Ingestion initialized for ${this.states.size} series`, this.context);
  }

  /**
   * Starts the runs of every due series
   */
  @Cron(CronExpression.EVERY_MINUTE)
  public async runDueSeries(): Promise<void> {
    const now = new Date();
    const due = this.seriesConfig.getSeries().filter((series) => this.retry.isDue(this.getState(series), now));
    if (due.length === 0) {
      return;
    }

    this.logger.debug(`Running ${due.length} due series`, this.context);
    await Promise.all(due.map((series) => this.runSeries(series)));
  }

  /**
   * Runs a series now, or joins its current run
   */
  public async runNow(seriesId: string): Promise<RunOutcome> {
    const series = this.requireSeries(seriesId);
    if (this.getState(series).status === RunStatus.NEEDS_ATTENTION && !this.inFlight.has(seriesId)) {
      throw new SeriesNeedsAttentionError(seriesId);
    }
    return this.runSeries(series);
  }

  /**
   * Clears needs_attention (or a pending backoff) and makes the series due immediately
   */
  public resume(seriesId: string): RetryState {
    const series = this.requireSeries(seriesId);
    const state = this.getState(series);
    if (state.status === RunStatus.RUNNING) {
      return state;
    }

    const resumed = this.retry.resumed(state, new Date());
    this.states.set(seriesId, resumed);
    this.logger.log(`Series ${seriesId} resumed from ${state.status}`, this.context);
    return resumed;
  }

  /**
   * Re-reads the series configuration; series whose definition changed start over
   */
  public reloadSeries(): SeriesDefinition[] {
    const series = this.seriesConfig.reload();
    this.syncStates();
    return series;
  }

  public async listSeries(): Promise<SeriesStatusDTO[]> {
    return Promise.all(
      this.seriesConfig.getSeries().map(async (series) => {
        const watermark = await this.store.getWatermark(series.id);
        return {
          series,
          state: this.getState(series),
          watermark: watermark?.toISOString() ?? null,
          running: this.inFlight.has(series.id)
        };
      })
    );
  }

  public requireSeries(seriesId: string): SeriesDefinition {
    const series = this.seriesConfig.findSeries(seriesId);
    if (!series) {
      throw new UnknownSeriesError(seriesId);
    }
    return series;
  }

  /**
   * Window [from, to) to fetch: after the watermark, or the initial history on a first run
   */
  public computeWindow(series: SeriesDefinition, watermark: Date | null, now: Date): { from: Date; to: Date } {
    let from: number;
    if (watermark) {
      from = watermark.getTime() + HOUR_MS;
    } else if (series.startOfHistory) {
      from = hourStartOf(series.startOfHistory.getTime());
    } else {
      from = hourStartOf(now.getTime() - this.initialDaysToFetch * DAY_MS);
    }

    return { from: new Date(from), to: now };
  }

  private runSeries(series: SeriesDefinition): Promise<RunOutcome> {
    const current = this.inFlight.get(series.id);
    if (current) {
      this.logger.debug(`Series ${series.id} is already running, joining the current run`, this.context);
      return current;
    }

    const run = this.execute(series).finally(() => this.inFlight.delete(series.id));
    this.inFlight.set(series.id, run);
    return run;
  }

  private async execute(series: SeriesDefinition): Promise<RunOutcome> {
    this.states.set(series.id, this.retry.started(this.getState(series)));

    try {
      const report = await this.ingest(series);
      this.states.set(series.id, this.retry.succeeded(this.getState(series), new Date(), series.pollIntervalMinutes));
      this.logger.log(
        `Series ${series.id}: fetched ${report.fetched} samples in ${report.from.toISOString()} - ` +
          `${report.to.toISOString()}, ${report.changed} buckets changed, watermark ` +
          `${report.watermark?.toISOString() ?? 'none'} (${report.durationMs}ms)`,
        this.context
      );
      return { ok: true, report };
    } catch (error) {
      const state = this.retry.failed(this.getState(series), error, new Date(), series.pollIntervalMinutes);
      this.states.set(series.id, state);

      if (state.status === RunStatus.NEEDS_ATTENTION) {
        this.logger.error(`Series ${series.id} needs attention`, error, this.context);
      } else if (state.status === RunStatus.RETRYING) {
        this.logger.warn(
          `Run of series ${series.id} failed (attempt ${state.attempt}), retrying at ` +
            `${state.nextEligibleAt.toISOString()}: ${state.lastError}`,
          this.context
        );
      } else {
        this.logger.error(
          `Run of series ${series.id} failed, retries exhausted, next poll at ${state.nextEligibleAt.toISOString()}`,
          error,
          this.context
        );
      }
      return { ok: false, error, state };
    }
  }

  private async ingest(series: SeriesDefinition): Promise<RunReport> {
    const startedAt = Date.now();
    const prior = await this.store.loadState(series.id);
    const { from, to } = this.computeWindow(series, prior.watermark, new Date(startedAt));

    const samples = from.getTime() < to.getTime() ? await this.collect(series, from, to) : [];
    const result = this.aggregator.aggregate(series, prior, samples);

    const watermarkChanged = result.watermark?.getTime() !== prior.watermark?.getTime();
    if (result.buckets.length > 0 || watermarkChanged) {
      await this.store.merge(series.id, result.buckets, result.watermark);
    }

    return {
      seriesId: series.id,
      from,
      to,
      fetched: samples.length,
      changed: result.buckets.length,
      misaligned: result.misaligned,
      late: result.late,
      watermark: result.watermark,
      durationMs: Date.now() - startedAt
    };
  }

  /**
   * Drains the fetcher, aborting the pending request once the run timeout elapses
   */
  private async collect(series: SeriesDefinition, from: Date, to: Date): Promise<Sample[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new FetchError('transient', `Run of series ${series.id} timed out after ${this.runTimeoutMs}ms`));
    }, this.runTimeoutMs);

    try {
      const samples: Sample[] = [];
      for await (const sample of this.meteringApi.fetchSamples(series, from, to, controller.signal)) {
        controller.signal.throwIfAborted();
        samples.push(sample);
      }
      controller.signal.throwIfAborted();
      return samples;
    } finally {
      clearTimeout(timer);
    }
  }

  private getState(series: SeriesDefinition): RetryState {
    const state = this.states.get(series.id);
    if (state) {
      return state;
    }
    const initial = this.retry.initial(seriesFingerprint(series), new Date());
    this.states.set(series.id, initial);
    return initial;
  }

  private syncStates(): void {
    const now = new Date();
    const series = this.seriesConfig.getSeries();

    for (const definition of series) {
      const fingerprint = seriesFingerprint(definition);
      const state = this.states.get(definition.id);
      this.states.set(
        definition.id,
        state ? this.retry.reconfigured(state, fingerprint, now) : this.retry.initial(fingerprint, now)
      );
    }

    const configured = new Set(series.map((definition) => definition.id));
    for (const seriesId of Array.from(this.states.keys())) {
      if (!configured.has(seriesId)) {
        this.states.delete(seriesId);
      }
    }
  }
}
