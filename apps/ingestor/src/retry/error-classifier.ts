import { isAxiosError } from 'axios';
import { TimeoutError } from 'rxjs';
import {
  FatalFetchException,
  FetchError,
  RetryableFetchException,
  describeError,
} from '../exceptions';

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
]);

/**
 * Map any failure of a fetch operation onto the retryable/fatal taxonomy.
 *
 * - timeouts, connection errors, HTTP 5xx: retryable
 * - HTTP 429: retryable, category `rate_limit`
 * - other HTTP 4xx and anything unrecognized: fatal
 */
export function classifyFetchError(error: unknown, source: string): FetchError {
  if (error instanceof RetryableFetchException || error instanceof FatalFetchException) {
    return error;
  }

  if (error instanceof TimeoutError) {
    return new RetryableFetchException(`${source}: request timed out`, source, 'transport', undefined, error);
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      if (error.code === undefined || TRANSPORT_ERROR_CODES.has(error.code) || error.request !== undefined) {
        return new RetryableFetchException(
          `${source}: transport error (${error.code ?? 'no response'}): ${error.message}`,
          source,
          'transport',
          undefined,
          error,
        );
      }
      return new FatalFetchException(`${source}: ${error.message}`, source, undefined, error);
    }
    if (status === 429) {
      return new RetryableFetchException(`${source}: rate limit exceeded (HTTP 429)`, source, 'rate_limit', status, error);
    }
    if (status >= 500) {
      return new RetryableFetchException(`${source}: upstream error (HTTP ${status})`, source, 'server', status, error);
    }
    return new FatalFetchException(`${source}: request rejected (HTTP ${status})`, source, status, error);
  }

  const code = extractErrorCode(error);
  if (code !== undefined && TRANSPORT_ERROR_CODES.has(code)) {
    return new RetryableFetchException(`${source}: transport error (${code})`, source, 'transport', undefined, error);
  }

  return new FatalFetchException(`${source}: ${describeError(error)}`, source, undefined, error);
}

function extractErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}
