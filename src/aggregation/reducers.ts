import _ from 'lodash';
import { Bucket, BucketOfKind, EnergyBucket, PowerBucket, SeriesKind, SlotValue } from './models/series.model';

export interface ReduceInput<B extends Bucket> {
  seriesId: string;
  hourStart: Date;
  /** Merged, deduplicated slots of the hour, never empty */
  slots: SlotValue[];
  /** Open bucket already persisted for the hour */
  prior?: B;
  /** Cumulative sum of the preceding bucket, energy only */
  baseline: number;
}

export interface BucketReducer<B extends Bucket> {
  reduce(input: ReduceInput<B>): B;
}

/**
 * Statistical range of 15 minute demand samples. Fewer than 4 slots is a partial hour.
 * Min and max only ever widen against the persisted bucket, even when a slot value is corrected.
 */
const powerReducer: BucketReducer<PowerBucket> = {
  reduce({ seriesId, hourStart, slots, prior }: ReduceInput<PowerBucket>): PowerBucket {
    const values = slots.map((slot) => slot.value);
    let min = Math.min(...values);
    let max = Math.max(...values);
    if (prior) {
      min = Math.min(min, prior.min);
      max = Math.max(max, prior.max);
    }

    return {
      kind: SeriesKind.POWER_DEMAND,
      seriesId,
      hourStart,
      slots,
      sampleCount: slots.length,
      closed: false,
      min,
      max,
      mean: _.mean(values)
    };
  }
};

/**
 * Hourly energy. The cumulative sum depends on the predecessor, so buckets must be reduced
 * in increasing hour order.
 */
const energyReducer: BucketReducer<EnergyBucket> = {
  reduce({ seriesId, hourStart, slots, baseline }: ReduceInput<EnergyBucket>): EnergyBucket {
    const sum = _.sumBy(slots, 'value');

    return {
      kind: SeriesKind.ENERGY_CONSUMPTION,
      seriesId,
      hourStart,
      slots,
      sampleCount: slots.length,
      closed: false,
      sum,
      mean: sum / slots.length,
      cumulativeSum: baseline + sum
    };
  }
};

const REDUCERS: { [K in SeriesKind]: BucketReducer<BucketOfKind<K>> } = {
  [SeriesKind.POWER_DEMAND]: powerReducer,
  [SeriesKind.ENERGY_CONSUMPTION]: energyReducer
};

export function reducerFor<K extends SeriesKind>(kind: K): BucketReducer<BucketOfKind<K>> {
  return REDUCERS[kind];
}

/**
 * Union of persisted and fresh slots, a fresh value replaces the persisted one for the same minute
 */
export function mergeSlots(persisted: SlotValue[], fresh: SlotValue[]): SlotValue[] {
  const byMinute = new Map<number, number>();
  for (const slot of persisted) {
    byMinute.set(slot.minute, slot.value);
  }
  for (const slot of fresh) {
    byMinute.set(slot.minute, slot.value);
  }

  return _.sortBy(
    Array.from(byMinute, ([minute, value]) => ({ minute, value })),
    'minute'
  );
}
