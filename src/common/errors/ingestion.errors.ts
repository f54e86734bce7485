/**
 * Error taxonomy shared by the fetcher, the aggregator and the ingestion scheduler
 *
 * Per-sample errors (misaligned, late) are collected and logged, never thrown out of a run.
 * Per-run errors (fetch, persist, cumulative sum corruption) abort the run of one series
 * and leave its watermark untouched.
 */

export type IngestionErrorCode =
  | 'FETCH_TRANSIENT'
  | 'FETCH_PERMANENT'
  | 'MISALIGNED_SAMPLE'
  | 'LATE_SAMPLE'
  | 'NON_MONOTONIC_CUMULATIVE_SUM'
  | 'PERSIST_FAILED';

export abstract class IngestionError extends Error {
  public abstract readonly code: IngestionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

/**
 * Provider side failure. Transient failures may be retried with the same window,
 * permanent ones need operator intervention (credentials, metering point, OBIS code).
 */
export class FetchError extends IngestionError {
  public readonly code: IngestionErrorCode;

  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = kind === 'transient' ? 'FETCH_TRANSIENT' : 'FETCH_PERMANENT';
  }

  public get transient(): boolean {
    return this.kind === 'transient';
  }
}

export class MisalignedSampleError extends IngestionError {
  public readonly code = 'MISALIGNED_SAMPLE' as const;

  constructor(
    public readonly seriesId: string,
    public readonly timestamp: Date,
    public readonly granularityMinutes: number
  ) {
    super(
      `Sample at ${timestamp.toISOString()} for series ${seriesId} is not aligned to a ${granularityMinutes} minute boundary`
    );
  }
}

/**
 * Sample for an hour whose bucket is already closed; history is immutable so it is discarded
 */
export class LateSampleError extends IngestionError {
  public readonly code = 'LATE_SAMPLE' as const;

  constructor(
    public readonly seriesId: string,
    public readonly timestamp: Date,
    public readonly hourStart: Date
  ) {
    super(
      `Sample at ${timestamp.toISOString()} for series ${seriesId} targets closed bucket ${hourStart.toISOString()}`
    );
  }
}

/**
 * The persisted cumulative chain of an energy series is broken, or would decrease.
 * Fatal for the run: the series needs an operator.
 */
export class NonMonotonicCumulativeSumError extends IngestionError {
  public readonly code = 'NON_MONOTONIC_CUMULATIVE_SUM' as const;

  constructor(
    public readonly seriesId: string,
    public readonly hourStart: Date,
    detail: string
  ) {
    super(`Cumulative sum of series ${seriesId} at ${hourStart.toISOString()}: ${detail}`);
  }
}

export class PersistError extends IngestionError {
  public readonly code = 'PERSIST_FAILED' as const;

  constructor(
    public readonly seriesId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to persist statistics for series ${seriesId}: ${message}`, options);
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
