import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { FetchedPrice, PriceSource } from '../interfaces';
import { SchemaValidator } from '../validation/schema-validator';
import { readString } from '../config/config.helpers';
import { AdapterRequest, BaseFetchAdapter } from './base.adapter';

/**
 * CoinPaprika ticker endpoint.
 *
 * Response quirks:
 * - price is nested under quotes.USD.price
 * - symbol is the exchange-style ticker ("BTC"), not the coin id
 */
@Injectable()
export class CoinPaprikaAdapter extends BaseFetchAdapter {
  readonly name = 'CoinPaprika';
  readonly defaultCoinId: string;

  private readonly baseUrl: string;

  constructor(httpService: HttpService, configService: ConfigService, schemaValidator: SchemaValidator) {
    super(PriceSource.COINPAPRIKA, httpService, configService, schemaValidator);
    this.baseUrl = readString(configService, 'COINPAPRIKA_BASE_URL', 'https://api.coinpaprika.com/v1').replace(/\/$/, '');
    this.defaultCoinId = readString(configService, 'COINPAPRIKA_COIN_ID', 'btc-bitcoin');
  }

  protected buildRequest(coinId: string): AdapterRequest {
    return { url: `${this.baseUrl}/tickers/${encodeURIComponent(coinId)}` };
  }

  protected expectedKeys(): string[] {
    return ['symbol', 'quotes', 'name'];
  }

  protected extract(body: unknown): FetchedPrice {
    const symbol = this.readPath(body, ['symbol']);
    if (typeof symbol !== 'string' || symbol.trim() === '') {
      throw this.fatal('field "symbol" is not a non-empty string');
    }
    const price = this.toPrice(this.readPath(body, ['quotes', 'USD', 'price']), 'quotes.USD.price');
    return { symbol: symbol.trim(), priceUsd: price, source: this.source };
  }
}
