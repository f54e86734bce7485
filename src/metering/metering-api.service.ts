import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import _ from 'lodash';
import { LoggingService } from '../common/logging.service';
import { errorMessage, FetchError, FetchErrorKind } from '../common/errors/ingestion.errors';
import { DAY_MS, MINUTE_MS } from '../common/utils/time.util';
import { Constants } from '../constants';
import { Sample, SeriesDefinition, SeriesKind } from '../aggregation/models/series.model';
import { MeteringAggregatedItem, MeteringTimeSeriesItem } from './models/metering.model';

dayjs.extend(utc);

export interface PageWindow {
  from: Date;
  to: Date;
}

interface RawPage {
  unit?: string;
  items: unknown[];
}

/**
 * Client for the metering provider REST API
 *
 * Retrieves raw samples of one series and normalizes them into {@link Sample}s.
 * Power series read the 15 minute load profile, energy series read the hourly
 * accumulated values of the aggregated endpoint.
 *
 * Features:
 * - Long windows are split into pages of at most METERING_MAX_DAYS_PER_REQUEST days
 * - Items with an unparseable timestamp or value are dropped with a warning
 * - Network failures, timeouts, 408, 429 and 5xx raise a transient FetchError
 * - Authentication and other 4xx responses raise a permanent FetchError
 *
 * Samples are yielded in provider order: no sorting and no deduplication.
 */
@Injectable()
export class MeteringApiService implements OnModuleInit {
  private readonly context = MeteringApiService.name;

  @Inject(LoggingService) private readonly logger!: LoggingService;

  // Configuration
  private baseUrl = '';
  private apiKey = '';
  private requestTimeoutMs = 30000;
  private maxDaysPerRequest = 30;
  private clockSkewMs = 5 * MINUTE_MS;

  /**
   * Module initialization
   */
  public onModuleInit(): void {
    this.baseUrl = Constants.METERING.API_BASE_URL.replace(/\/+$/, '');
    this.apiKey = Constants.METERING.API_KEY;
    this.requestTimeoutMs = Constants.METERING.REQUEST_TIMEOUT_MS;
    this.maxDaysPerRequest = Constants.METERING.MAX_DAYS_PER_REQUEST;
    this.clockSkewMs = Constants.METERING.CLOCK_SKEW_MINUTES * MINUTE_MS;

    if (!this.apiKey) {
      this.logger.warn('METERING_API_KEY is not set, every request will be rejected', this.context);
    }
  }

  /**
   * Lazily fetches the samples of a series in [from, to)
   * @param series - Series to fetch
   * @param from - Inclusive window start
   * @param to - Exclusive window end, at most "now" plus the clock skew allowance
   * @param signal - Aborts the pending request when the run is cancelled
   */
  public async *fetchSamples(
    series: SeriesDefinition,
    from: Date,
    to: Date,
    signal?: AbortSignal
  ): AsyncGenerator<Sample> {
    this.validateWindow(from, to);

    for (const page of this.splitWindow(from, to)) {
      const raw =
        series.kind === SeriesKind.POWER_DEMAND
          ? await this.requestTimeSeries(series, page, signal)
          : await this.requestAggregated(series, page, signal);

      const unit = raw.unit || series.unit;
      let invalid = 0;

      for (const item of raw.items) {
        const sample = this.toSample(item, unit);
        if (!sample) {
          invalid++;
          continue;
        }
        // The aggregated endpoint is day granular, keep only what belongs to this page
        if (sample.timestamp < page.from || sample.timestamp >= page.to) {
          continue;
        }
        yield sample;
      }

      if (invalid > 0) {
        this.logger.warn(
          `Dropped ${invalid} invalid items for series ${series.id} in ${page.from.toISOString()} - ${page.to.toISOString()}`,
          this.context
        );
      }
    }
  }

  private validateWindow(from: Date, to: Date): void {
    if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
      throw new RangeError('Fetch window bounds must be valid dates');
    }
    if (from.getTime() > to.getTime()) {
      throw new RangeError(`Fetch window start ${from.toISOString()} is after its end ${to.toISOString()}`);
    }
    if (to.getTime() > Date.now() + this.clockSkewMs) {
      throw new RangeError(`Fetch window end ${to.toISOString()} is in the future`);
    }
  }

  /**
   * Splits a window into consecutive pages of at most maxDaysPerRequest days
   */
  public splitWindow(from: Date, to: Date): PageWindow[] {
    const pageMs = this.maxDaysPerRequest * DAY_MS;
    const pages: PageWindow[] = [];

    for (let start = from.getTime(); start < to.getTime(); start += pageMs) {
      pages.push({ from: new Date(start), to: new Date(Math.min(start + pageMs, to.getTime())) });
    }

    return pages;
  }

  private async requestTimeSeries(
    series: SeriesDefinition,
    page: PageWindow,
    signal?: AbortSignal
  ): Promise<RawPage> {
    const body = await this.apiCall(
      `/metering-points/${encodeURIComponent(series.meteringPoint)}/time-series`,
      {
        startDateTime: dayjs.utc(page.from).format('YYYY-MM-DDTHH:mm:ss[Z]'),
        endDateTime: dayjs.utc(page.to).format('YYYY-MM-DDTHH:mm:ss[Z]'),
        obisCode: series.obisCode
      },
      series.energyId,
      signal
    );

    return this.readPage(body, 'items');
  }

  private async requestAggregated(
    series: SeriesDefinition,
    page: PageWindow,
    signal?: AbortSignal
  ): Promise<RawPage> {
    const body = await this.apiCall(
      `/metering-points/${encodeURIComponent(series.meteringPoint)}/time-series/aggregated`,
      {
        startDate: dayjs.utc(page.from).format('YYYY-MM-DD'),
        // endDate is inclusive
        endDate: dayjs.utc(page.to.getTime() - 1).format('YYYY-MM-DD'),
        obisCode: series.obisCode,
        aggregationLevel: 'Hour',
        transformationMode: 'Accumulation'
      },
      series.energyId,
      signal
    );

    return this.readPage(body, 'aggregatedTimeSeries');
  }

  /**
   * Performs an authenticated API call and returns the parsed JSON body
   */
  private async apiCall(
    endpoint: string,
    params: Record<string, string>,
    energyId: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}?${new URLSearchParams(params).toString()}`;
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'X-API-KEY': this.apiKey,
          'X-ENERGY-ID': energyId,
          Accept: 'application/json'
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout
      });
    } catch (error) {
      throw new FetchError('transient', `Request to ${endpoint} failed: ${errorMessage(error)}`, undefined, {
        cause: error
      });
    }

    if (!response.ok) {
      // The error body is not used, release the connection
      await response.body
        ?.cancel()
        .catch((error: unknown) =>
          this.logger.debug(`Could not discard the error body of ${endpoint}: ${errorMessage(error)}`, this.context)
        );
      throw new FetchError(
        this.classifyStatus(response.status),
        `Metering API error: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new FetchError('transient', `Metering API returned a malformed body for ${endpoint}`, response.status, {
        cause: error
      });
    }
  }

  private classifyStatus(status: number): FetchErrorKind {
    if (status === 408 || status === 429 || status >= 500) {
      return 'transient';
    }
    return status >= 400 ? 'permanent' : 'transient';
  }

  /**
   * Validates the envelope; an absent list means the provider has no data for the page
   */
  private readPage(body: unknown, listKey: 'items' | 'aggregatedTimeSeries'): RawPage {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new FetchError('transient', 'Metering API returned an unexpected body');
    }

    const list: unknown = Reflect.get(body, listKey);
    const unit: unknown = Reflect.get(body, 'unit');
    if (list !== undefined && list !== null && !Array.isArray(list)) {
      throw new FetchError('transient', `Metering API returned a non-list ${listKey}`);
    }

    return {
      unit: typeof unit === 'string' ? unit : undefined,
      items: Array.isArray(list) ? list : []
    };
  }

  private toSample(item: unknown, unit: string): Sample | null {
    if (!isRawItem(item)) {
      return null;
    }

    const timestamp = new Date(item.startedAt);
    const value =
      typeof item.value === 'number' ? item.value : item.value.trim() === '' ? NaN : _.toNumber(item.value);

    if (Number.isNaN(timestamp.getTime()) || !Number.isFinite(value)) {
      return null;
    }

    const sample: Sample = { timestamp, value, unit };
    if (typeof item.calculated === 'boolean') {
      sample.quality = item.calculated ? 'calculated' : 'actual';
    }
    return sample;
  }
}

function isRawItem(item: unknown): item is MeteringTimeSeriesItem | MeteringAggregatedItem {
  return (
    typeof item === 'object' &&
    item !== null &&
    typeof Reflect.get(item, 'startedAt') === 'string' &&
    ['number', 'string'].includes(typeof Reflect.get(item, 'value'))
  );
}
