import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout } from 'rxjs';
import { FetchAdapter, FetchedPrice, RetryPolicy } from '../interfaces';
import { FatalFetchException } from '../exceptions';
import { classifyFetchError } from '../retry';
import { SchemaValidator, isRecord } from '../validation/schema-validator';
import { readNumber } from '../config/config.helpers';
import { FetchSource, resolveRetryPolicy } from '../config/retry-policies.config';

export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

export interface AdapterRequest {
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

/**
 * Shared request/validate/extract pipeline for upstream price APIs.
 * Subclasses describe the request and how to pull the price out of the body.
 */
export abstract class BaseFetchAdapter implements FetchAdapter {
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;

  abstract readonly name: string;
  abstract readonly defaultCoinId: string;

  /** Resolved at construction so a bad RETRY_* override fails at boot */
  readonly retryPolicy: RetryPolicy;

  constructor(
    readonly source: FetchSource,
    protected readonly httpService: HttpService,
    protected readonly configService: ConfigService,
    protected readonly schemaValidator: SchemaValidator,
  ) {
    this.logger = new Logger(this.constructor.name);
    this.timeoutMs = readNumber(configService, 'FETCH_TIMEOUT_MS', DEFAULT_FETCH_TIMEOUT_MS);
    this.retryPolicy = resolveRetryPolicy(configService, source);
  }

  protected abstract buildRequest(coinId: string): AdapterRequest;

  /** Top-level keys the response is expected to carry */
  protected abstract expectedKeys(coinId: string): string[];

  /**
   * @throws FatalFetchException when the required field is absent or malformed
   */
  protected abstract extract(body: unknown, coinId: string): FetchedPrice;

  async fetch(coinId: string = this.defaultCoinId): Promise<FetchedPrice> {
    const request = this.buildRequest(coinId);
    const body = await this.getJson(request);
    this.schemaValidator.inspect(this.name, body, this.expectedKeys(coinId));
    const price = this.extract(body, coinId);
    this.logger.debug(`${this.name} - ${price.symbol}: $${price.priceUsd}`);
    return price;
  }

  /**
   * Single GET with a fixed timeout. Failures are rethrown already classified
   * so the retry executor can decide whether to try again.
   */
  protected async getJson(request: AdapterRequest): Promise<unknown> {
    try {
      const response = await firstValueFrom(
        this.httpService
          .get<unknown>(request.url, {
            params: request.params,
            headers: request.headers,
            timeout: this.timeoutMs,
          })
          .pipe(timeout(this.timeoutMs)),
      );
      return response.data;
    } catch (error) {
      throw classifyFetchError(error, this.name);
    }
  }

  protected fatal(message: string): FatalFetchException {
    return new FatalFetchException(`${this.name}: ${message}`, this.name);
  }

  /**
   * Follow a path of object keys, failing fatally at the first gap
   */
  protected readPath(body: unknown, path: string[]): unknown {
    let current: unknown = body;
    for (const key of path) {
      if (!isRecord(current) || !(key in current)) {
        throw this.fatal(`response is missing required field "${path.join('.')}"`);
      }
      current = current[key];
    }
    return current;
  }

  /**
   * Accepts numbers and numeric strings; zero, negative or non-finite values are fatal
   */
  protected toPrice(value: unknown, field: string): number {
    const price = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
      throw this.fatal(`field "${field}" is not a positive price: ${JSON.stringify(value)}`);
    }
    return price;
  }
}
