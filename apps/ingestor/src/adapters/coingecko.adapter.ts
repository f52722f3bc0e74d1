import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { FetchedPrice, PriceSource } from '../interfaces';
import { SchemaValidator } from '../validation/schema-validator';
import { readOptionalString, readString } from '../config/config.helpers';
import { AdapterRequest, BaseFetchAdapter } from './base.adapter';

export const COINGECKO_API_KEY_HEADER = 'x-cg-demo-api-key';

/**
 * CoinGecko simple/price endpoint. Authenticated when COINGECKO_API_KEY is set.
 *
 * The body is keyed by coin id ({"bitcoin": {"usd": 97000}}), so the symbol
 * comes from configuration rather than the response.
 */
@Injectable()
export class CoinGeckoAdapter extends BaseFetchAdapter {
  readonly name = 'CoinGecko';
  readonly defaultCoinId: string;

  private readonly baseUrl: string;
  private readonly symbol: string;
  private readonly apiKey: string | undefined;

  constructor(httpService: HttpService, configService: ConfigService, schemaValidator: SchemaValidator) {
    super(PriceSource.COINGECKO, httpService, configService, schemaValidator);
    this.baseUrl = readString(configService, 'COINGECKO_BASE_URL', 'https://api.coingecko.com/api/v3').replace(/\/$/, '');
    this.defaultCoinId = readString(configService, 'COINGECKO_COIN_ID', 'bitcoin');
    this.symbol = readString(configService, 'COINGECKO_SYMBOL', 'BTC');
    this.apiKey = readOptionalString(configService, 'COINGECKO_API_KEY');

    if (this.apiKey) {
      this.logger.log('Using authenticated CoinGecko API key');
    } else {
      this.logger.warn('COINGECKO_API_KEY is not set; requests are unauthenticated and rate limits are stricter');
    }
  }

  protected buildRequest(coinId: string): AdapterRequest {
    return {
      url: `${this.baseUrl}/simple/price`,
      params: { ids: coinId, vs_currencies: 'usd' },
      headers: this.apiKey ? { [COINGECKO_API_KEY_HEADER]: this.apiKey } : undefined,
    };
  }

  protected expectedKeys(coinId: string): string[] {
    return [coinId];
  }

  protected extract(body: unknown, coinId: string): FetchedPrice {
    const price = this.toPrice(this.readPath(body, [coinId, 'usd']), `${coinId}.usd`);
    return { symbol: this.symbol, priceUsd: price, source: this.source };
  }
}
