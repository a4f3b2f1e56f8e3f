/**
 * Historical close tables
 *
 * History arrives in one of three shapes. The shape is detected once, at
 * ingestion, and carried as a tag so lookups never have to probe columns:
 * - flat:      one close column per ticker            (date, NVDA, AAPL)
 * - composite: (ticker, field) columns                (date, NVDA:Close, NVDA:Open) or (Close:NVDA)
 * - single:    one close series for a single ticker   (date, Open, High, Low, Close)
 */

import Papa from 'papaparse';

export type CloseSeries = Array<number | null>;

export type PriceHistory =
  | { shape: 'flat'; dates: string[]; closes: Record<string, CloseSeries> }
  | { shape: 'composite'; dates: string[]; fields: Record<string, Record<string, CloseSeries>> }
  | { shape: 'single'; dates: string[]; ticker?: string; closes: CloseSeries };

export interface DailyClose {
  date: string; // YYYY-MM-DD
  close: number;
}

export interface IngestOptions {
  dateColumn?: string;
  // Label for a single-series table
  ticker?: string;
}

const COMPOSITE_SEPARATOR = ':';
const PRICE_FIELDS = ['open', 'high', 'low', 'close', 'adj close', 'volume'];

export const EMPTY_HISTORY: PriceHistory = { shape: 'flat', dates: [], closes: {} };

/**
 * Normalize column name for comparison (lowercase, trim)
 */
function normalizeColumnName(name: string): string {
  return name.toLowerCase().trim();
}

/**
 * Parse a date string to YYYY-MM-DD format
 * Extracts the date component from "2024-01-15", "2024-01-15T00:00:00", "2024-01-15T00:00:00.000+00:00"
 */
export function parseDate(value: unknown): string | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  const dateMatch = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (dateMatch) {
    const [, year, month, day] = dateMatch;
    return `${year}-${month}-${day}`;
  }

  // Fallback: try parsing the full string (using UTC to avoid timezone shift)
  const date = new Date(trimmed);
  if (isNaN(date.getTime())) {
    return null;
  }
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a numeric cell. Blank, "null", "N/D" and non-finite values are missing.
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === 'null' || trimmed === 'undefined' || trimmed === 'N/D') {
    return null;
  }
  const num = parseFloat(trimmed);
  return Number.isFinite(num) ? num : null;
}

function splitCompositeKey(column: string): { ticker: string; field: string } | null {
  const parts = column.split(COMPOSITE_SEPARATOR).map((part) => part.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }
  const [first, second] = parts;
  // (Close, NVDA) ordering: the field comes first
  if (PRICE_FIELDS.includes(normalizeColumnName(first)) && !PRICE_FIELDS.includes(normalizeColumnName(second))) {
    return { ticker: second, field: first };
  }
  return { ticker: first, field: second };
}

/**
 * Build a tagged history from generic rows (CSV rows, JSON records).
 * Rows with an unparseable date are dropped; rows are sorted ascending by date.
 */
export function ingestPriceHistory(
  rows: Array<Record<string, unknown>>,
  options: IngestOptions = {}
): PriceHistory {
  if (rows.length === 0) {
    return EMPTY_HISTORY;
  }

  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }

  const dateColumn = options.dateColumn
    ?? columns.find((c) => normalizeColumnName(c) === 'date');
  if (!dateColumn) {
    return EMPTY_HISTORY;
  }

  const dated = rows
    .map((row) => ({ date: parseDate(row[dateColumn]), row }))
    .filter((entry): entry is { date: string; row: Record<string, unknown> } => entry.date !== null)
    .sort((a, b) => a.date.localeCompare(b.date));

  const dates = dated.map((entry) => entry.date);
  const valueColumns = columns.filter((c) => c !== dateColumn);
  const seriesFor = (column: string): CloseSeries => dated.map((entry) => parseNumber(entry.row[column]));

  const compositeColumns = valueColumns
    .map((column) => ({ column, key: splitCompositeKey(column) }))
    .filter((entry): entry is { column: string; key: { ticker: string; field: string } } => entry.key !== null);

  if (compositeColumns.length > 0) {
    const fields: Record<string, Record<string, CloseSeries>> = {};
    for (const { column, key } of compositeColumns) {
      fields[key.ticker] = fields[key.ticker] ?? {};
      fields[key.ticker][key.field] = seriesFor(column);
    }
    return { shape: 'composite', dates, fields };
  }

  const isPriceField = (column: string) => PRICE_FIELDS.includes(normalizeColumnName(column));
  const closeColumn = valueColumns.find((c) => normalizeColumnName(c) === 'close');
  // Single series only when no column is labelled with a ticker
  if (closeColumn && valueColumns.every(isPriceField)) {
    return { shape: 'single', dates, ticker: options.ticker, closes: seriesFor(closeColumn) };
  }

  const closes: Record<string, CloseSeries> = {};
  for (const column of valueColumns) {
    if (!isPriceField(column)) {
      closes[column] = seriesFor(column);
    }
  }
  return { shape: 'flat', dates, closes };
}

/**
 * Parse CSV text into a tagged history
 */
export function parseHistoryCsv(csvText: string, options: IngestOptions = {}): PriceHistory {
  const results = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });
  return ingestPriceHistory(results.data, options);
}

/**
 * Align per-ticker daily closes on the union of their dates
 */
export function buildFlatHistory(seriesByTicker: Record<string, DailyClose[]>): PriceHistory {
  const dateSet = new Set<string>();
  for (const series of Object.values(seriesByTicker)) {
    series.forEach((point) => dateSet.add(point.date));
  }
  // YYYY-MM-DD is lexicographically sortable
  const dates = [...dateSet].sort((a, b) => a.localeCompare(b));

  const closes: Record<string, CloseSeries> = {};
  for (const [ticker, series] of Object.entries(seriesByTicker)) {
    const byDate = new Map<string, number>();
    series.forEach((point) => byDate.set(point.date, point.close));
    closes[ticker] = dates.map((date) => byDate.get(date) ?? null);
  }

  return { shape: 'flat', dates, closes };
}

/**
 * Close series for a ticker.
 * An unlabelled single series belongs to whichever ticker is the sole instrument,
 * so it is only returned when `soleInstrument` is set.
 */
export function getCloseSeries(
  history: PriceHistory,
  ticker: string,
  soleInstrument = false
): CloseSeries | undefined {
  switch (history.shape) {
    case 'flat':
      return history.closes[ticker];
    case 'composite': {
      const fields = history.fields[ticker];
      if (!fields) return undefined;
      const closeField = Object.keys(fields).find((f) => normalizeColumnName(f) === 'close');
      if (closeField) return fields[closeField];
      // No Close field: use the ticker's first column
      const [firstField] = Object.keys(fields);
      return firstField === undefined ? undefined : fields[firstField];
    }
    case 'single':
      if (history.ticker !== undefined) {
        return history.ticker === ticker ? history.closes : undefined;
      }
      return soleInstrument ? history.closes : undefined;
  }
}

export function isEmptyHistory(history: PriceHistory): boolean {
  return history.dates.length === 0;
}
