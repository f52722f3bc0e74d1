import { ConfigService } from '@nestjs/config';
import { PriceSource, RetryPolicy } from '../interfaces';
import { readBoolean, readNumber } from './config.helpers';

export type FetchSource = PriceSource.COINPAPRIKA | PriceSource.COINGECKO;

/**
 * Default backoff per upstream API.
 *
 * CoinGecko's free tier rate-limits aggressively, so it gets fewer,
 * longer-spaced attempts than CoinPaprika.
 */
export const DEFAULT_RETRY_POLICIES: Record<FetchSource, RetryPolicy> = {
  [PriceSource.COINPAPRIKA]: {
    maxAttempts: 5,
    baseDelayMs: 2000,
    growthFactor: 2,
    maxDelayMs: 10000,
    jitter: false,
  },
  [PriceSource.COINGECKO]: {
    maxAttempts: 3,
    baseDelayMs: 4000,
    growthFactor: 2,
    maxDelayMs: 20000,
    jitter: false,
  },
};

/**
 * Resolve a source's policy, letting RETRY_<SOURCE>_* variables override each field.
 * e.g. RETRY_COINGECKO_MAX_ATTEMPTS=5
 */
export function resolveRetryPolicy(config: ConfigService, source: FetchSource): RetryPolicy {
  const defaults = DEFAULT_RETRY_POLICIES[source];
  const prefix = `RETRY_${source.toUpperCase()}`;

  const policy: RetryPolicy = {
    maxAttempts: readNumber(config, `${prefix}_MAX_ATTEMPTS`, defaults.maxAttempts),
    baseDelayMs: readNumber(config, `${prefix}_BASE_DELAY_MS`, defaults.baseDelayMs),
    growthFactor: readNumber(config, `${prefix}_GROWTH_FACTOR`, defaults.growthFactor),
    maxDelayMs: readNumber(config, `${prefix}_MAX_DELAY_MS`, defaults.maxDelayMs),
    jitter: readBoolean(config, `${prefix}_JITTER`, defaults.jitter ?? false),
  };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`${prefix}_MAX_ATTEMPTS must be a positive integer`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0 || policy.growthFactor < 1) {
    throw new Error(`${prefix} backoff parameters are out of range`);
  }
  return policy;
}
