import { Logger } from '@nestjs/common';
import { FatalFetchException, FetchError } from '../exceptions';
import { RetryPolicy } from '../interfaces';
import { classifyFetchError } from './error-classifier';

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: FatalFetchException; attempts: number };

export interface RetryOptions {
  /** Name used in log lines and error messages */
  label: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Called once per failed attempt, after classification */
  onAttemptFailed?: (error: FetchError, attempt: number) => void;
}

const defaultLogger = new Logger('RetryExecutor');

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait before the attempt that follows `attempt` (1-based)
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.growthFactor, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  if (!policy.jitter) {
    return capped;
  }
  return Math.round(capped * (0.5 + random() * 0.5));
}

/**
 * Run `operation` until it succeeds, fails fatally, or the policy runs out of attempts.
 * Never throws: every failure comes back as a fatal outcome.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const logger = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      if (attempt > 1) {
        logger.log(`${options.label}: succeeded on attempt ${attempt}/${maxAttempts}`);
      }
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      const classified = classifyFetchError(error, options.label);
      options.onAttemptFailed?.(classified, attempt);

      if (classified instanceof FatalFetchException) {
        logger.error(`${options.label}: fatal failure on attempt ${attempt}, not retrying: ${classified.message}`);
        return { ok: false, error: classified, attempts: attempt };
      }

      if (attempt >= maxAttempts) {
        const exhausted = FatalFetchException.fromExhausted(classified, attempt);
        logger.error(exhausted.message);
        return { ok: false, error: exhausted, attempts: attempt };
      }

      const delay = computeBackoffDelay(policy, attempt, options.random);
      if (classified.category === 'rate_limit') {
        logger.warn(`${options.label}: rate limited on attempt ${attempt}/${maxAttempts}, backing off ${delay}ms`);
      } else {
        logger.warn(
          `${options.label}: ${classified.category} failure on attempt ${attempt}/${maxAttempts}, retrying in ${delay}ms: ${classified.message}`,
        );
      }
      await sleep(delay);
    }
  }
}
