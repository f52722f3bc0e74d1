import { FetchedPrice, PriceSource } from './price-observation.interface';
import { RetryPolicy } from './retry-policy.interface';

/**
 * One upstream price source. Implementations issue a single request per call
 * and leave retrying to the retry executor.
 */
export interface FetchAdapter {
  /** Human readable name used in logs */
  readonly name: string;

  readonly source: PriceSource;

  /** Coin identifier used when the caller does not pass one */
  readonly defaultCoinId: string;

  readonly retryPolicy: RetryPolicy;

  /**
   * Fetch the current USD price for a coin
   * @throws RetryableFetchException for transient upstream failures
   * @throws FatalFetchException when retrying cannot help
   */
  fetch(coinId: string): Promise<FetchedPrice>;
}
