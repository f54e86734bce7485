export enum SeriesKind {
  POWER_DEMAND = 'POWER_DEMAND',
  ENERGY_CONSUMPTION = 'ENERGY_CONSUMPTION'
}

/**
 * Native sample granularity per series kind, in minutes
 */
export const SERIES_GRANULARITY_MINUTES: Readonly<Record<SeriesKind, number>> = {
  [SeriesKind.POWER_DEMAND]: 15,
  [SeriesKind.ENERGY_CONSUMPTION]: 60
};

export interface SeriesDefinition {
  id: string;
  name: string;
  meteringPoint: string;
  energyId: string;
  obisCode: string;
  kind: SeriesKind;
  unit: string;
  lateArrivalMarginMinutes: number;
  pollIntervalMinutes: number;
  startOfHistory: Date | null;
}

export type SampleQuality = 'actual' | 'calculated';

export interface Sample {
  timestamp: Date;
  value: number;
  unit: string;
  quality?: SampleQuality;
}

/**
 * Value observed for one native interval inside an hour
 */
export interface SlotValue {
  minute: number; // offset from hourStart
  value: number;
}

interface BucketBase {
  seriesId: string;
  hourStart: Date;
  sampleCount: number;
  closed: boolean;
  slots: SlotValue[];
}

export interface PowerBucket extends BucketBase {
  kind: SeriesKind.POWER_DEMAND;
  min: number;
  max: number;
  mean: number;
}

export interface EnergyBucket extends BucketBase {
  kind: SeriesKind.ENERGY_CONSUMPTION;
  sum: number;
  mean: number;
  cumulativeSum: number;
}

export type Bucket = PowerBucket | EnergyBucket;

export type BucketOfKind<K extends SeriesKind> = Extract<Bucket, { kind: K }>;

/**
 * What the store knows about a series at the start of a run
 */
export interface SeriesState {
  watermark: Date | null;
  /** Buckets with hourStart >= watermark, or every bucket when there is no watermark */
  buckets: Bucket[];
}

export interface AggregationResult {
  /** New or changed buckets, ordered by hourStart */
  buckets: Bucket[];
  watermark: Date | null;
  misaligned: number;
  late: number;
}
