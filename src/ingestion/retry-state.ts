import {
  errorMessage,
  FetchError,
  IngestionError,
  NonMonotonicCumulativeSumError
} from '../common/errors/ingestion.errors';
import { backoffDelay, RandomSource } from '../common/utils/backoff.util';
import { MINUTE_MS } from '../common/utils/time.util';
import { RetryPolicy, RetryState, RunStatus } from './models/ingestion.model';

const JITTER_RATIO = 0.25;

/**
 * Errors no retry can fix: the provider rejects the request as such, or the stored
 * history of the series is inconsistent
 */
export function requiresAttention(error: unknown): boolean {
  return (
    (error instanceof FetchError && !error.transient) ||
    error instanceof NonMonotonicCumulativeSumError ||
    error instanceof RangeError
  );
}

/**
 * Transitions of the per-series scheduling state. Every transition returns a new state.
 *
 * idle --run--> running --ok--> idle (next poll)
 *                       --transient--> retrying (backoff) ... after maxRetries --> idle (next poll)
 *                       --permanent--> needs_attention --resume/config change--> idle
 */
export class RetryStateMachine {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly random: RandomSource = Math.random
  ) {}

  public initial(fingerprint: string, now: Date): RetryState {
    return {
      status: RunStatus.IDLE,
      attempt: 0,
      nextEligibleAt: now,
      lastError: null,
      lastErrorCode: null,
      lastSuccessAt: null,
      fingerprint
    };
  }

  public isDue(state: RetryState, now: Date): boolean {
    if (state.status === RunStatus.RUNNING || state.status === RunStatus.NEEDS_ATTENTION) {
      return false;
    }
    return now.getTime() >= state.nextEligibleAt.getTime();
  }

  public started(state: RetryState): RetryState {
    return { ...state, status: RunStatus.RUNNING };
  }

  public succeeded(state: RetryState, now: Date, pollIntervalMinutes: number): RetryState {
    return {
      ...state,
      status: RunStatus.IDLE,
      attempt: 0,
      nextEligibleAt: new Date(now.getTime() + pollIntervalMinutes * MINUTE_MS),
      lastError: null,
      lastErrorCode: null,
      lastSuccessAt: now
    };
  }

  public failed(state: RetryState, error: unknown, now: Date, pollIntervalMinutes: number): RetryState {
    const failure = {
      lastError: errorMessage(error),
      lastErrorCode: error instanceof IngestionError ? error.code : null
    };

    if (requiresAttention(error)) {
      return {
        ...state,
        ...failure,
        status: RunStatus.NEEDS_ATTENTION,
        attempt: state.attempt + 1,
        nextEligibleAt: now
      };
    }

    const attempt = state.attempt + 1;
    if (attempt > this.policy.maxRetries) {
      // Out of retries: back to the regular cadence
      return {
        ...state,
        ...failure,
        status: RunStatus.IDLE,
        attempt: 0,
        nextEligibleAt: new Date(now.getTime() + pollIntervalMinutes * MINUTE_MS)
      };
    }

    const delay = backoffDelay(
      attempt,
      { initialDelayMs: this.policy.initialDelayMs, maxDelayMs: this.policy.maxDelayMs, jitterRatio: JITTER_RATIO },
      this.random
    );
    return {
      ...state,
      ...failure,
      status: RunStatus.RETRYING,
      attempt,
      nextEligibleAt: new Date(now.getTime() + delay)
    };
  }

  public resumed(state: RetryState, now: Date): RetryState {
    return { ...state, status: RunStatus.IDLE, attempt: 0, nextEligibleAt: now };
  }

  /**
   * A changed configuration starts over; an unchanged one keeps its state
   */
  public reconfigured(state: RetryState, fingerprint: string, now: Date): RetryState {
    return state.fingerprint === fingerprint ? state : this.initial(fingerprint, now);
  }
}
