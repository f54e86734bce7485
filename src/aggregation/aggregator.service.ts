import { Inject, Injectable } from '@nestjs/common';
import _ from 'lodash';
import { LoggingService } from '../common/logging.service';
import {
  LateSampleError,
  MisalignedSampleError,
  NonMonotonicCumulativeSumError
} from '../common/errors/ingestion.errors';
import { HOUR_MS, MINUTE_MS, hourStartOf } from '../common/utils/time.util';
import {
  AggregationResult,
  Bucket,
  EnergyBucket,
  Sample,
  SERIES_GRANULARITY_MINUTES,
  SeriesDefinition,
  SeriesKind,
  SeriesState,
  SlotValue
} from './models/series.model';
import { mergeSlots, reducerFor } from './reducers';

// Tolerance when checking a persisted cumulative chain, relative to the magnitude of the sum
const CUMULATIVE_EPSILON = 1e-9;

/**
 * Turns the raw samples of one fetch into hourly buckets reconciled with the persisted state
 *
 * The computation is pure and synchronous: nothing is read or written here, the caller
 * persists the returned buckets and watermark in one batch.
 *
 * Steps:
 * 1. Deduplicate by timestamp, the later sample in fetch order wins
 * 2. Drop samples off the series granularity and samples for closed hours
 * 3. Merge fresh slots into open persisted buckets and reduce every touched hour
 * 4. Close hours whose end plus the late arrival margin is behind the latest observed sample
 * 5. Advance the watermark over the contiguous run of closed hours
 */
@Injectable()
export class AggregatorService {
  private readonly context = AggregatorService.name;

  @Inject(LoggingService) private readonly logger!: LoggingService;

  public aggregate(series: SeriesDefinition, prior: SeriesState, samples: Sample[]): AggregationResult {
    const granularityMinutes = SERIES_GRANULARITY_MINUTES[series.kind];
    const marginMs = series.lateArrivalMarginMinutes * MINUTE_MS;
    const watermarkMs = prior.watermark ? prior.watermark.getTime() : null;

    const priorBuckets = _.sortBy(
      prior.buckets.filter((bucket) => bucket.kind === series.kind),
      (bucket) => bucket.hourStart.getTime()
    );
    const priorByHour = new Map<number, Bucket>(priorBuckets.map((bucket) => [bucket.hourStart.getTime(), bucket]));

    if (series.kind === SeriesKind.ENERGY_CONSUMPTION) {
      this.verifyCumulativeChain(series, prior.watermark, priorBuckets);
    }
    const closedFrontierMs = _.max(priorBuckets.filter((bucket) => bucket.closed).map((b) => b.hourStart.getTime()));

    // Map keeps the first insertion position but the last value per key
    const deduplicated = new Map<number, Sample>();
    for (const sample of samples) {
      deduplicated.set(sample.timestamp.getTime(), sample);
    }

    const fresh = new Map<number, SlotValue[]>();
    let latestObservedMs: number | null = null;
    let misaligned = 0;
    let late = 0;
    let calculated = 0;

    for (const [timestampMs, sample] of deduplicated) {
      if (timestampMs % (granularityMinutes * MINUTE_MS) !== 0) {
        misaligned++;
        this.logger.warn(new MisalignedSampleError(series.id, sample.timestamp, granularityMinutes).message, this.context);
        continue;
      }

      latestObservedMs = latestObservedMs === null ? timestampMs : Math.max(latestObservedMs, timestampMs);
      const hourMs = hourStartOf(timestampMs);

      const isLate =
        (watermarkMs !== null && hourMs <= watermarkMs) ||
        priorByHour.get(hourMs)?.closed === true ||
        (series.kind === SeriesKind.ENERGY_CONSUMPTION && closedFrontierMs !== undefined && hourMs < closedFrontierMs);
      if (isLate) {
        late++;
        this.logger.debug(new LateSampleError(series.id, sample.timestamp, new Date(hourMs)).message, this.context);
        continue;
      }

      if (sample.quality === 'calculated') {
        calculated++;
      }
      const slots = fresh.get(hourMs) ?? [];
      slots.push({ minute: (timestampMs - hourMs) / MINUTE_MS, value: sample.value });
      fresh.set(hourMs, slots);
    }

    if (late > 0) {
      this.logger.warn(`Discarded ${late} late samples for closed hours of series ${series.id}`, this.context);
    }
    if (calculated > 0) {
      this.logger.debug(`${calculated} samples of series ${series.id} are flagged as calculated`, this.context);
    }

    const hours = _.sortBy(_.union(Array.from(priorByHour.keys()), Array.from(fresh.keys())));
    const merged = new Map<number, Bucket>();
    const changed: Bucket[] = [];
    let baseline = 0;

    for (const hourMs of hours) {
      const persisted = priorByHour.get(hourMs);

      if (persisted?.closed) {
        merged.set(hourMs, persisted);
        if (persisted.kind === SeriesKind.ENERGY_CONSUMPTION) {
          baseline = persisted.cumulativeSum;
        }
        continue;
      }

      const slots = mergeSlots(persisted?.slots ?? [], fresh.get(hourMs) ?? []);
      const bucket = this.reduceHour(series, new Date(hourMs), slots, persisted, baseline);

      if (bucket.kind === SeriesKind.ENERGY_CONSUMPTION) {
        if (bucket.cumulativeSum < baseline) {
          throw new NonMonotonicCumulativeSumError(
            series.id,
            bucket.hourStart,
            `would decrease from ${baseline} to ${bucket.cumulativeSum}`
          );
        }
        baseline = bucket.cumulativeSum;
      }

      const timeClosed = latestObservedMs !== null && hourMs + HOUR_MS + marginMs <= latestObservedMs;
      if (series.kind === SeriesKind.ENERGY_CONSUMPTION) {
        // A cumulative sum is final only once its predecessor is
        const predecessor = merged.get(hourMs - HOUR_MS);
        const chainClosed = predecessor ? predecessor.closed : merged.size === 0 && watermarkMs === null;
        bucket.closed = timeClosed && chainClosed;
      } else {
        bucket.closed = timeClosed;
      }

      merged.set(hourMs, bucket);
      if (!persisted || !_.isEqual(persisted, bucket)) {
        changed.push(bucket);
      }
    }

    const watermark = this.advanceWatermark(prior.watermark, hours, merged);

    this.logger.debug(
      `Series ${series.id}: ${deduplicated.size} samples, ${changed.length} buckets changed, ` +
        `watermark ${prior.watermark?.toISOString() ?? 'none'} -> ${watermark?.toISOString() ?? 'none'}`,
      this.context
    );

    return { buckets: changed, watermark, misaligned, late };
  }

  /**
   * Dispatches on the series kind so each reducer only ever sees its own bucket variant
   */
  private reduceHour(
    series: SeriesDefinition,
    hourStart: Date,
    slots: SlotValue[],
    persisted: Bucket | undefined,
    baseline: number
  ): Bucket {
    switch (series.kind) {
      case SeriesKind.POWER_DEMAND:
        return reducerFor(SeriesKind.POWER_DEMAND).reduce({
          seriesId: series.id,
          hourStart,
          slots,
          prior: persisted?.kind === SeriesKind.POWER_DEMAND ? persisted : undefined,
          baseline
        });
      case SeriesKind.ENERGY_CONSUMPTION:
        return reducerFor(SeriesKind.ENERGY_CONSUMPTION).reduce({
          seriesId: series.id,
          hourStart,
          slots,
          prior: persisted?.kind === SeriesKind.ENERGY_CONSUMPTION ? persisted : undefined,
          baseline
        });
    }
  }

  /**
   * Walks forward from the prior watermark while hours are present and closed.
   * Without a watermark the walk starts at the earliest known hour.
   */
  private advanceWatermark(current: Date | null, hours: number[], merged: Map<number, Bucket>): Date | null {
    let watermarkMs = current ? current.getTime() : null;
    let cursor: number | undefined = watermarkMs !== null ? watermarkMs + HOUR_MS : hours[0];

    while (cursor !== undefined && merged.get(cursor)?.closed) {
      watermarkMs = cursor;
      cursor += HOUR_MS;
    }

    return watermarkMs === null ? null : new Date(watermarkMs);
  }

  /**
   * Closed energy buckets must form a non-decreasing chain where every cumulative sum
   * equals its predecessor's plus its own sum.
   * Open buckets are recomputed from the closed chain on every run and are not checked.
   */
  private verifyCumulativeChain(series: SeriesDefinition, watermark: Date | null, buckets: Bucket[]): void {
    const energyBuckets = buckets.filter(
      (bucket): bucket is EnergyBucket => bucket.kind === SeriesKind.ENERGY_CONSUMPTION && bucket.closed
    );

    if (watermark && !energyBuckets.some((bucket) => bucket.hourStart.getTime() === watermark.getTime())) {
      throw new NonMonotonicCumulativeSumError(series.id, watermark, 'bucket at the watermark is missing');
    }

    for (let i = 1; i < energyBuckets.length; i++) {
      const previous = energyBuckets[i - 1];
      const current = energyBuckets[i];
      const expected = previous.cumulativeSum + current.sum;
      const tolerance = CUMULATIVE_EPSILON * Math.max(1, Math.abs(expected));

      if (current.cumulativeSum < previous.cumulativeSum || Math.abs(current.cumulativeSum - expected) > tolerance) {
        throw new NonMonotonicCumulativeSumError(
          series.id,
          current.hourStart,
          `persisted ${current.cumulativeSum}, expected ${expected}`
        );
      }
    }
  }
}
