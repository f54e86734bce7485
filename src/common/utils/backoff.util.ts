export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number; // 0.25 = ±25%
}

export type RandomSource = () => number;

/**
 * Exponential backoff delay with jitter for a 1-based attempt number
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy, random: RandomSource = Math.random): number {
  const exponentialDelay = policy.initialDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  const jitter = cappedDelay * policy.jitterRatio * (random() - 0.5) * 2;

  return Math.max(0, Math.round(cappedDelay + jitter));
}
