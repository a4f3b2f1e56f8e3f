/**
 * Cash allocation
 *
 * Converts an amount into whole-share holdings. Shares are always floored;
 * whatever cannot buy a whole share stays as leftover cash.
 */

import { EmptyTickerListError } from './errors';
import { dedupeTickers } from './strategy-resolver';
import { getCloseSeries, isEmptyHistory, type PriceHistory } from './price-history';
import type { AllocationResult, Holding, PriceQuote } from './types/portfolio';

// Moving average window, in rows
export const TREND_LOOKBACK = 20;
// Present closes required inside the window before the average counts
export const TREND_MIN_OBSERVATIONS = 5;
// Squaring the price/average ratio amplifies the momentum signal
export const TREND_EXPONENT = 2;

export function isUsablePrice(price: number | undefined): price is number {
  return price !== undefined && Number.isFinite(price) && price > 0;
}

/**
 * Simple moving average over the last `lookback` rows, skipping missing closes.
 * Returns null with fewer than `minObservations` closes.
 */
export function movingAverage(
  closes: Array<number | null>,
  lookback = TREND_LOOKBACK,
  minObservations = TREND_MIN_OBSERVATIONS
): number | null {
  const window = closes
    .slice(-lookback)
    .filter((value): value is number => value !== null && Number.isFinite(value));
  if (window.length < minObservations) {
    return null;
  }
  return window.reduce((sum, value) => sum + value, 0) / window.length;
}

export function equalWeights(tickers: string[]): Record<string, number> {
  const weights: Record<string, number> = {};
  tickers.forEach((ticker) => {
    weights[ticker] = 1 / tickers.length;
  });
  return weights;
}

/**
 * Trend weights: (price / moving average) ^ TREND_EXPONENT, normalized to sum to 1.
 * Tickers without a usable price or average keep the baseline score of 1.
 */
export function trendWeights(
  tickers: string[],
  prices: PriceQuote,
  history: PriceHistory
): Record<string, number> {
  const scores: Record<string, number> = {};

  for (const ticker of tickers) {
    scores[ticker] = 1;

    const price = prices[ticker];
    if (!isUsablePrice(price)) continue;

    const closes = getCloseSeries(history, ticker, tickers.length === 1);
    if (!closes) continue;

    const average = movingAverage(closes);
    if (average !== null && average > 0) {
      scores[ticker] = Math.pow(price / average, TREND_EXPONENT);
    }
  }

  const total = tickers.reduce((sum, ticker) => sum + scores[ticker], 0);
  if (total === 0 || !Number.isFinite(total)) {
    return equalWeights(tickers);
  }

  const weights: Record<string, number> = {};
  for (const ticker of tickers) {
    weights[ticker] = scores[ticker] / total;
  }
  return weights;
}

export function allocate(
  amount: number,
  tickers: string[],
  prices: PriceQuote,
  history?: PriceHistory
): AllocationResult {
  const universe = dedupeTickers(tickers);
  if (universe.length === 0) {
    throw new EmptyTickerListError('Tickers list cannot be empty');
  }

  const weights = history && !isEmptyHistory(history)
    ? trendWeights(universe, prices, history)
    : equalWeights(universe);

  const holdings: Holding[] = [];
  let totalUsed = 0;

  for (const ticker of universe) {
    const price = prices[ticker];
    if (!isUsablePrice(price)) continue;

    const weight = weights[ticker];
    const target = amount * weight;
    const shares = Math.floor(target / price);
    if (shares <= 0) continue;

    const allocatedUsd = shares * price;
    totalUsed += allocatedUsd;
    holdings.push({
      ticker,
      allocatedUsd,
      sharesPurchased: shares,
      weightPct: Math.round(weight * 100 * 100) / 100,
    });
  }

  return { holdings, leftoverCash: amount - totalUsed };
}
