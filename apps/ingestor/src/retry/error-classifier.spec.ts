import { AxiosError, AxiosHeaders } from 'axios';
import { TimeoutError } from 'rxjs';
import { FatalFetchException, RetryableFetchException } from '../exceptions';
import { classifyFetchError } from './error-classifier';

function axiosError(options: { status?: number; code?: string; requestSent?: boolean }): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response =
    options.status === undefined
      ? undefined
      : { status: options.status, statusText: '', headers: {}, config, data: null };
  return new AxiosError('Request failed', options.code, config, options.requestSent ? {} : undefined, response);
}

describe('classifyFetchError', () => {
  it('should pass already classified errors through', () => {
    const retryable = new RetryableFetchException('x', 'CoinGecko', 'server', 502);
    const fatal = new FatalFetchException('y', 'CoinGecko');

    expect(classifyFetchError(retryable, 'CoinGecko')).toBe(retryable);
    expect(classifyFetchError(fatal, 'CoinGecko')).toBe(fatal);
  });

  it('should classify an rxjs timeout as a retryable transport failure', () => {
    const result = classifyFetchError(new TimeoutError(), 'CoinPaprika');

    expect(result).toBeInstanceOf(RetryableFetchException);
    expect(result.message).toBe('CoinPaprika: request timed out');
    expect(result.kind === 'retryable' && result.category).toBe('transport');
  });

  it('should classify HTTP 5xx as retryable server errors', () => {
    const result = classifyFetchError(axiosError({ status: 503, requestSent: true }), 'CoinGecko');

    expect(result).toBeInstanceOf(RetryableFetchException);
    expect(result.message).toBe('CoinGecko: upstream error (HTTP 503)');
    expect(result.statusCode).toBe(503);
  });

  it('should classify HTTP 429 as a retryable rate limit', () => {
    const result = classifyFetchError(axiosError({ status: 429, requestSent: true }), 'CoinGecko');

    expect(result).toBeInstanceOf(RetryableFetchException);
    expect(result.kind === 'retryable' && result.category).toBe('rate_limit');
    expect(result.message).toBe('CoinGecko: rate limit exceeded (HTTP 429)');
  });

  it.each([400, 401, 403, 404])('should classify HTTP %i as fatal', (status) => {
    const result = classifyFetchError(axiosError({ status, requestSent: true }), 'CoinGecko');

    expect(result).toBeInstanceOf(FatalFetchException);
    expect(result.message).toBe(`CoinGecko: request rejected (HTTP ${status})`);
    expect(result.statusCode).toBe(status);
  });

  it('should classify connection failures as retryable transport errors', () => {
    const result = classifyFetchError(axiosError({ code: 'ECONNREFUSED' }), 'CoinPaprika');

    expect(result).toBeInstanceOf(RetryableFetchException);
    expect(result.message).toBe('CoinPaprika: transport error (ECONNREFUSED): Request failed');
  });

  it('should treat a request-less axios error with an unknown code as fatal', () => {
    const result = classifyFetchError(axiosError({ code: 'ERR_BAD_OPTION' }), 'CoinPaprika');

    expect(result).toBeInstanceOf(FatalFetchException);
    expect(result.message).toBe('CoinPaprika: Request failed');
  });

  it('should recognize socket error codes on plain errors', () => {
    const socketError = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    const result = classifyFetchError(socketError, 'CoinGecko');

    expect(result).toBeInstanceOf(RetryableFetchException);
    expect(result.message).toBe('CoinGecko: transport error (ECONNRESET)');
  });

  it('should treat anything else as fatal', () => {
    const result = classifyFetchError(new TypeError('bad input'), 'CoinGecko');

    expect(result).toBeInstanceOf(FatalFetchException);
    expect(result.message).toBe('CoinGecko: bad input');
  });
});
