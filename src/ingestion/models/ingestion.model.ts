import { IngestionErrorCode } from '../../common/errors/ingestion.errors';
import { SeriesDefinition, SeriesKind } from '../../aggregation/models/series.model';

export enum RunStatus {
  IDLE = 'idle',
  RUNNING = 'running',
  RETRYING = 'retrying',
  NEEDS_ATTENTION = 'needs_attention'
}

/**
 * Scheduling state of one series, kept in memory
 */
export interface RetryState {
  status: RunStatus;
  attempt: number; // consecutive failed runs
  nextEligibleAt: Date;
  lastError: string | null;
  lastErrorCode: IngestionErrorCode | null;
  lastSuccessAt: Date | null;
  fingerprint: string;
}

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface RunReport {
  seriesId: string;
  from: Date;
  to: Date;
  fetched: number;
  changed: number;
  misaligned: number;
  late: number;
  watermark: Date | null;
  durationMs: number;
}

export type RunOutcome = { ok: true; report: RunReport } | { ok: false; error: unknown; state: RetryState };

/**
 * Entry of the optional series configuration file
 */
export interface SeriesConfigEntry {
  id?: string; // prefix of the series id, replaces the metering point
  name?: string;
  meteringPoint?: string;
  energyId?: string;
  obisCode: string;
  kind: SeriesKind;
  unit?: string;
  lateArrivalMarginMinutes?: number;
  pollIntervalMinutes?: number;
  startOfHistory?: string;
}

export interface SeriesStatusDTO {
  series: SeriesDefinition;
  state: RetryState;
  watermark: string | null;
  running: boolean;
}

export interface StatisticDTO {
  hourStart: string;
  kind: SeriesKind;
  closed: boolean;
  sampleCount: number;
  mean: number;
  min?: number;
  max?: number;
  sum?: number;
  cumulativeSum?: number;
}

export interface RunResponse {
  success: boolean;
  report?: RunReport;
  state?: RetryState;
  message?: string;
  timestamp: string;
}
