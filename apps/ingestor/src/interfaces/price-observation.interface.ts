/**
 * Standardized identifiers for every place a price can come from
 */
export enum PriceSource {
  COINPAPRIKA = 'coinpaprika',
  COINGECKO = 'coingecko',
  CSV_REPORT = 'csv_report',
}

/**
 * A normalized price produced by a fetch adapter or a batch file,
 * before the store has assigned it an id and capture time.
 */
export interface FetchedPrice {
  /** Ticker symbol as reported upstream (e.g. 'BTC') */
  symbol: string;

  /** Price in USD */
  priceUsd: number;

  source: PriceSource;
}

/**
 * A persisted price sample. Immutable once written.
 */
export interface PriceObservation extends FetchedPrice {
  id: number;

  /** Capture time, assigned by the store at persistence time */
  timestamp: Date;
}

export interface PaginatedObservations {
  page: number;
  limit: number;
  count: number;
  data: PriceObservation[];
}
