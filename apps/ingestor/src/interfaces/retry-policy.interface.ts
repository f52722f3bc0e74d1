/**
 * Bounded exponential backoff.
 * The wait before attempt n+1 is min(baseDelayMs * growthFactor^(n-1), maxDelayMs).
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  growthFactor: number;
  maxDelayMs: number;
  /** Scale each wait by a random factor in [0.5, 1] */
  jitter?: boolean;
}
