import { Bucket, SeriesKind, SlotValue } from '../../aggregation/models/series.model';

/**
 * Flat storage shape shared by the database implementations.
 * Kind specific fields are absent on the other kind.
 */
export interface StoredStatistic {
  seriesId: string;
  hourStart: Date;
  kind: SeriesKind;
  closed: boolean;
  sampleCount: number;
  slots: SlotValue[];
  mean: number;
  min?: number | null;
  max?: number | null;
  sum?: number | null;
  cumulativeSum?: number | null;
}

export function toStoredStatistic(bucket: Bucket): StoredStatistic {
  const base = {
    seriesId: bucket.seriesId,
    hourStart: bucket.hourStart,
    kind: bucket.kind,
    closed: bucket.closed,
    sampleCount: bucket.sampleCount,
    slots: bucket.slots.map(({ minute, value }) => ({ minute, value })),
    mean: bucket.mean
  };

  if (bucket.kind === SeriesKind.POWER_DEMAND) {
    return { ...base, min: bucket.min, max: bucket.max };
  }
  return { ...base, sum: bucket.sum, cumulativeSum: bucket.cumulativeSum };
}

/**
 * Rebuilds a domain bucket from a stored record, dropping every storage field
 * (_id, _rev, timestamps) so buckets compare by value
 */
export function toBucket(record: StoredStatistic): Bucket {
  const base = {
    seriesId: record.seriesId,
    hourStart: new Date(record.hourStart),
    sampleCount: record.sampleCount,
    closed: record.closed,
    slots: record.slots.map(({ minute, value }) => ({ minute, value }))
  };

  switch (record.kind) {
    case SeriesKind.POWER_DEMAND:
      return {
        ...base,
        kind: SeriesKind.POWER_DEMAND,
        min: requireNumber(record, 'min'),
        max: requireNumber(record, 'max'),
        mean: record.mean
      };
    case SeriesKind.ENERGY_CONSUMPTION:
      return {
        ...base,
        kind: SeriesKind.ENERGY_CONSUMPTION,
        sum: requireNumber(record, 'sum'),
        mean: record.mean,
        cumulativeSum: requireNumber(record, 'cumulativeSum')
      };
  }
}

function requireNumber(record: StoredStatistic, field: 'min' | 'max' | 'sum' | 'cumulativeSum'): number {
  const value = record[field];
  if (typeof value !== 'number') {
    throw new TypeError(
      `Stored statistic ${record.seriesId} at ${new Date(record.hourStart).toISOString()} has no ${field}`
    );
  }
  return value;
}
