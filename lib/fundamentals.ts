/**
 * Fundamentals snapshot used by screening strategies
 *
 * Stored as data/fundamentals.json:
 *   { "asOf": "2026-09-30", "fundamentals": { "AAPL": { "sector": "Technology", ... } } }
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { DATA_CONFIG } from './env';
import { createLogger } from './logger';
import type { Fundamentals } from './types/portfolio';

const log = createLogger('Fundamentals');

/**
 * Get the fundamentals file path from environment variable or default
 */
export function getFundamentalsPath(): string {
  if (DATA_CONFIG.FUNDAMENTALS_FILE) {
    return DATA_CONFIG.FUNDAMENTALS_FILE;
  }
  return join(process.cwd(), 'data', 'fundamentals.json');
}

function readOptionalNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only well-typed attributes; anything else is treated as absent
 */
export function normalizeFundamentals(raw: unknown): Fundamentals | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const fundamentals: Fundamentals = {};
  if (typeof raw.sector === 'string' && raw.sector.trim() !== '') {
    fundamentals.sector = raw.sector.trim();
  }
  fundamentals.revenueGrowth = readOptionalNumber(raw, 'revenueGrowth');
  fundamentals.returnOnEquity = readOptionalNumber(raw, 'returnOnEquity');
  fundamentals.debtToEquity = readOptionalNumber(raw, 'debtToEquity');
  fundamentals.trailingPE = readOptionalNumber(raw, 'trailingPE');

  return fundamentals;
}

/**
 * Parse a fundamentals snapshot. Accepts the wrapped form or a bare ticker map.
 */
export function parseFundamentalsSnapshot(data: unknown): Record<string, Fundamentals> {
  if (!isRecord(data)) {
    return {};
  }
  const entries = isRecord(data.fundamentals) ? data.fundamentals : data;

  const result: Record<string, Fundamentals> = {};
  for (const [ticker, raw] of Object.entries(entries)) {
    const fundamentals = normalizeFundamentals(raw);
    if (fundamentals) {
      result[ticker.toUpperCase()] = fundamentals;
    }
  }
  return result;
}

/**
 * Load fundamentals for the given tickers.
 * A missing or unreadable snapshot yields an empty map; screening then falls back.
 */
export async function loadFundamentals(
  tickers: string[],
  filePath: string = getFundamentalsPath()
): Promise<Record<string, Fundamentals>> {
  let snapshot: Record<string, Fundamentals>;
  try {
    const content = await readFile(filePath, 'utf-8');
    snapshot = parseFundamentalsSnapshot(JSON.parse(content));
  } catch (error) {
    log.warn(`Could not read ${filePath}:`, error instanceof Error ? error.message : error);
    return {};
  }

  const result: Record<string, Fundamentals> = {};
  for (const ticker of tickers) {
    const fundamentals = snapshot[ticker];
    if (fundamentals) {
      result[ticker] = fundamentals;
    } else {
      log.debug(`No fundamentals for ${ticker}`);
    }
  }
  return result;
}
