import { parse } from 'csv-parse/sync';
import { FetchedPrice, PriceSource } from '../interfaces';
import { BatchFormatException } from '../exceptions';
import { isRecord } from '../validation/schema-validator';

export const CSV_SYMBOL_COLUMN = 'Ticker';
export const CSV_PRICE_COLUMN = 'LastPrice';

/**
 * Parse a market report with a header row. Rows without a ticker or a price
 * are skipped; a price that is not a positive number rejects the whole file.
 */
export function parseCsvPrices(content: Buffer | string): FetchedPrice[] {
  let rows: unknown;
  try {
    rows = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
      info: true,
    });
  } catch (error) {
    throw new BatchFormatException(`Malformed CSV: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!Array.isArray(rows)) {
    throw new BatchFormatException('Malformed CSV: no rows');
  }

  const prices: FetchedPrice[] = [];
  for (const entry of rows) {
    if (!isRecord(entry) || !isRecord(entry.record)) {
      continue;
    }
    const row = entry.record;
    const symbol = row[CSV_SYMBOL_COLUMN];
    const rawPrice = row[CSV_PRICE_COLUMN];
    if (typeof symbol !== 'string' || symbol === '' || typeof rawPrice !== 'string' || rawPrice === '') {
      continue;
    }

    const priceUsd = Number(rawPrice);
    if (!Number.isFinite(priceUsd) || priceUsd <= 0) {
      const line = isRecord(entry.info) && typeof entry.info.lines === 'number' ? entry.info.lines : undefined;
      const where = line === undefined ? '' : ` on line ${line}`;
      throw new BatchFormatException(`Invalid ${CSV_PRICE_COLUMN} "${rawPrice}" for ${symbol}${where}`, line);
    }
    prices.push({ symbol, priceUsd, source: PriceSource.CSV_REPORT });
  }
  return prices;
}
