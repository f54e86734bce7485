import { EnergyBucket, PowerBucket, Sample, SeriesDefinition, SeriesKind } from '../../src/aggregation/models/series.model';

export const METERING_POINT = 'LU-TEST-METERING-POINT';
export const ENERGY_ID = 'test-energy-id';

export function powerSeries(overrides: Partial<SeriesDefinition> = {}): SeriesDefinition {
  return {
    id: `${METERING_POINT}_1-1:1.29.0_pwr_hourly`,
    name: 'Active Consumption power',
    meteringPoint: METERING_POINT,
    energyId: ENERGY_ID,
    obisCode: '1-1:1.29.0',
    kind: SeriesKind.POWER_DEMAND,
    unit: 'kW',
    lateArrivalMarginMinutes: 0,
    pollIntervalMinutes: 120,
    startOfHistory: null,
    ...overrides
  };
}

export function energySeries(overrides: Partial<SeriesDefinition> = {}): SeriesDefinition {
  return powerSeries({
    id: `${METERING_POINT}_1-1:1.29.0_energy_hourly`,
    name: 'Active Consumption energy',
    kind: SeriesKind.ENERGY_CONSUMPTION,
    unit: 'kWh',
    ...overrides
  });
}

export function at(iso: string): Date {
  return new Date(iso);
}

export function sample(iso: string, value: number, unit = 'kW'): Sample {
  return { timestamp: at(iso), value, unit };
}

export function powerBucket(
  series: SeriesDefinition,
  hourIso: string,
  values: Array<[number, number]>,
  closed: boolean
): PowerBucket {
  const slotValues = values.map(([, value]) => value);
  return {
    kind: SeriesKind.POWER_DEMAND,
    seriesId: series.id,
    hourStart: at(hourIso),
    sampleCount: values.length,
    closed,
    slots: values.map(([minute, value]) => ({ minute, value })),
    min: Math.min(...slotValues),
    max: Math.max(...slotValues),
    mean: slotValues.reduce((total, value) => total + value, 0) / values.length
  };
}

export function energyBucket(
  series: SeriesDefinition,
  hourIso: string,
  sum: number,
  cumulativeSum: number,
  closed: boolean
): EnergyBucket {
  return {
    kind: SeriesKind.ENERGY_CONSUMPTION,
    seriesId: series.id,
    hourStart: at(hourIso),
    sampleCount: 1,
    closed,
    slots: [{ minute: 0, value: sum }],
    sum,
    mean: sum,
    cumulativeSum
  };
}
