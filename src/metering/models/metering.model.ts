/**
 * One 15 minute reading of the time-series endpoint
 */
export interface MeteringTimeSeriesItem {
  startedAt: string;
  value: number | string;
  type?: string;
  version?: number;
  calculated?: boolean;
}

/**
 * One hourly value of the aggregated endpoint
 */
export interface MeteringAggregatedItem {
  startedAt: string;
  endedAt?: string;
  value: number | string;
  calculated?: boolean;
}

export interface ObisCodeInfo {
  code: string;
  description: string;
  serviceType: 'Consumption' | 'Production';
  powerUnit: string;
  energyUnit: string;
}
