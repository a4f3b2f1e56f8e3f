/**
 * Market data provider
 *
 * Live quotes and daily history come from Stooq's CSV endpoints:
 *   {STOOQ_URL}/q/l/?s=nvda.us&f=sd2t2ohlcv&h&e=csv   Symbol,Date,Time,Open,High,Low,Close,Volume
 *   {STOOQ_URL}/q/d/l/?s=nvda.us&i=d                  Date,Open,High,Low,Close,Volume
 * Fundamentals come from the local snapshot (see fundamentals.ts).
 *
 * Per-ticker failures are logged and skipped; callers receive partial maps.
 */

import Papa from 'papaparse';
import { MARKET_DATA_CONFIG } from './env';
import { loadFundamentals } from './fundamentals';
import { createLogger } from './logger';
import { buildFlatHistory, parseDate, parseNumber, type DailyClose, type PriceHistory } from './price-history';
import type { Fundamentals, PriceQuote } from './types/portfolio';

const log = createLogger('Market Data');

export interface MarketDataProvider {
  getLivePrices(tickers: string[]): Promise<PriceQuote>;
  getPriceHistory(tickers: string[], rows: number): Promise<PriceHistory>;
  getFundamentals(tickers: string[]): Promise<Record<string, Fundamentals>>;
}

export interface StooqProviderOptions {
  baseUrl?: string;
  concurrency?: number;
  timeoutMs?: number;
  fundamentalsFile?: string;
}

/**
 * Map items through an async function, at most `concurrency` at a time
 */
export async function mapInBatches<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];
  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    results.push(...(await Promise.all(batch.map(fn))));
  }
  return results;
}

export function toStooqSymbol(ticker: string): string {
  return `${ticker.trim().toLowerCase()}.us`;
}

function parseCsvRows(csvText: string): Record<string, string>[] {
  const results = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim().toLowerCase(),
  });
  return results.data;
}

/**
 * Last price from a Stooq quote CSV. Stooq reports unknown symbols as "N/D".
 */
export function parseQuoteCsv(csvText: string): number | null {
  const [row] = parseCsvRows(csvText);
  if (!row) {
    return null;
  }
  const close = parseNumber(row.close);
  return close !== null && close > 0 ? close : null;
}

/**
 * Daily closes from a Stooq history CSV, ascending, last `rows` kept
 */
export function parseDailyCsv(csvText: string, rows: number): DailyClose[] {
  const closes: DailyClose[] = [];
  for (const row of parseCsvRows(csvText)) {
    const date = parseDate(row.date);
    const close = parseNumber(row.close);
    if (date !== null && close !== null) {
      closes.push({ date, close });
    }
  }
  closes.sort((a, b) => a.date.localeCompare(b.date));
  return closes.slice(-rows);
}

export class StooqMarketDataProvider implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly fundamentalsFile?: string;

  constructor(options: StooqProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? MARKET_DATA_CONFIG.STOOQ_URL).replace(/\/+$/, '');
    this.concurrency = options.concurrency ?? MARKET_DATA_CONFIG.FETCH_CONCURRENCY;
    this.timeoutMs = options.timeoutMs ?? MARKET_DATA_CONFIG.FETCH_TIMEOUT_MS;
    this.fundamentalsFile = options.fundamentalsFile;
  }

  private async fetchText(url: string): Promise<string> {
    const response = await fetch(url, {
      cache: 'no-store',
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP Error: ${response.status}`);
    }
    return response.text();
  }

  private async fetchQuote(ticker: string): Promise<number | null> {
    const url = `${this.baseUrl}/q/l/?s=${toStooqSymbol(ticker)}&f=sd2t2ohlcv&h&e=csv`;
    try {
      return parseQuoteCsv(await this.fetchText(url));
    } catch (error) {
      log.warn(`Quote failed for ${ticker}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  private async fetchDaily(ticker: string, rows: number): Promise<DailyClose[]> {
    const url = `${this.baseUrl}/q/d/l/?s=${toStooqSymbol(ticker)}&i=d`;
    try {
      return parseDailyCsv(await this.fetchText(url), rows);
    } catch (error) {
      log.warn(`History failed for ${ticker}:`, error instanceof Error ? error.message : error);
      return [];
    }
  }

  async getLivePrices(tickers: string[]): Promise<PriceQuote> {
    const quotes = await mapInBatches(tickers, this.concurrency, async (ticker) => {
      const quote = await this.fetchQuote(ticker);
      if (quote !== null) {
        return { ticker, price: quote };
      }
      // No live quote: fall back to the last daily close
      const [last] = (await this.fetchDaily(ticker, 1)).slice(-1);
      return { ticker, price: last ? last.close : null };
    });

    const prices: PriceQuote = {};
    for (const { ticker, price } of quotes) {
      if (price !== null) {
        prices[ticker] = price;
      } else {
        log.warn(`No price available for ${ticker}`);
      }
    }
    return prices;
  }

  async getPriceHistory(tickers: string[], rows: number): Promise<PriceHistory> {
    const series = await mapInBatches(tickers, this.concurrency, async (ticker) => ({
      ticker,
      closes: await this.fetchDaily(ticker, rows),
    }));

    const seriesByTicker: Record<string, DailyClose[]> = {};
    for (const { ticker, closes } of series) {
      if (closes.length > 0) {
        seriesByTicker[ticker] = closes;
      }
    }
    return buildFlatHistory(seriesByTicker);
  }

  async getFundamentals(tickers: string[]): Promise<Record<string, Fundamentals>> {
    return this.fundamentalsFile
      ? loadFundamentals(tickers, this.fundamentalsFile)
      : loadFundamentals(tickers);
  }
}
