import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { PriceSource } from '../interfaces';
import { FatalFetchException, RetryableFetchException } from '../exceptions';
import { SchemaValidator } from '../validation/schema-validator';
import { COINGECKO_API_KEY_HEADER, CoinGeckoAdapter } from './coingecko.adapter';

function response(data: unknown): AxiosResponse<unknown> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('CoinGeckoAdapter', () => {
  let adapter: CoinGeckoAdapter;
  let httpService: HttpService;
  let config: Record<string, unknown>;

  const createAdapter = async (): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CoinGeckoAdapter,
        SchemaValidator,
        { provide: HttpService, useValue: { get: jest.fn() } },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => config[key]) } },
      ],
    }).compile();

    adapter = module.get<CoinGeckoAdapter>(CoinGeckoAdapter);
    httpService = module.get<HttpService>(HttpService);
  };

  beforeEach(async () => {
    config = {};
    await createAdapter();
  });

  describe('fetch', () => {
    it('should query simple/price without a key header by default', async () => {
      jest.mocked(httpService.get).mockReturnValue(of(response({ bitcoin: { usd: 97000 } })));

      const price = await adapter.fetch();

      expect(price).toEqual({ symbol: 'BTC', priceUsd: 97000, source: PriceSource.COINGECKO });
      expect(httpService.get).toHaveBeenCalledWith('https://api.coingecko.com/api/v3/simple/price', {
        params: { ids: 'bitcoin', vs_currencies: 'usd' },
        headers: undefined,
        timeout: 10000,
      });
    });

    it('should send the API key header when configured', async () => {
      config = { COINGECKO_API_KEY: 'test-secret', COINGECKO_SYMBOL: 'ETH' };
      await createAdapter();
      jest.mocked(httpService.get).mockReturnValue(of(response({ ethereum: { usd: 3100 } })));

      const price = await adapter.fetch('ethereum');

      expect(price).toEqual({ symbol: 'ETH', priceUsd: 3100, source: PriceSource.COINGECKO });
      expect(httpService.get).toHaveBeenCalledWith(
        'https://api.coingecko.com/api/v3/simple/price',
        expect.objectContaining({
          params: { ids: 'ethereum', vs_currencies: 'usd' },
          headers: { [COINGECKO_API_KEY_HEADER]: 'test-secret' },
        }),
      );
    });

    it('should fail fatally when the coin is absent from the body', async () => {
      jest.mocked(httpService.get).mockReturnValue(of(response({})));

      const attempt = adapter.fetch();

      await expect(attempt).rejects.toBeInstanceOf(FatalFetchException);
      await expect(attempt).rejects.toThrow('CoinGecko: response is missing required field "bitcoin.usd"');
    });

    it('should surface HTTP 429 as a retryable rate limit', async () => {
      const requestConfig = { headers: new AxiosHeaders() };
      jest.mocked(httpService.get).mockReturnValue(
        throwError(
          () =>
            new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', requestConfig, {}, {
              data: null,
              status: 429,
              statusText: 'Too Many Requests',
              headers: {},
              config: requestConfig,
            }),
        ),
      );

      const error = await adapter.fetch().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetryableFetchException);
      expect(error instanceof RetryableFetchException && error.category).toBe('rate_limit');
    });
  });

  describe('retryPolicy', () => {
    it('should apply RETRY_COINGECKO_* overrides', async () => {
      config = { RETRY_COINGECKO_MAX_ATTEMPTS: '5' };
      await createAdapter();

      expect(adapter.retryPolicy.maxAttempts).toBe(5);
      expect(adapter.retryPolicy.baseDelayMs).toBe(4000);
    });

    it('should reject an invalid override when the adapter is built', async () => {
      config = { RETRY_COINGECKO_MAX_ATTEMPTS: '0' };

      await expect(createAdapter()).rejects.toThrow('RETRY_COINGECKO_MAX_ATTEMPTS must be a positive integer');
    });
  });
});
