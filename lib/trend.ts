/**
 * Historical portfolio value
 *
 * Replays a fixed share allocation over the last few rows of a history table.
 */

import { getCloseSeries, type PriceHistory } from './price-history';
import { roundCurrency } from './valuation';
import type { AllocationResult, TrendPoint } from './types/portfolio';

export const TREND_POINTS = 5;

export function reconstructTrend(
  allocation: AllocationResult,
  history: PriceHistory,
  points = TREND_POINTS
): TrendPoint[] {
  const { holdings } = allocation;
  const rowCount = history.dates.length;
  if (holdings.length === 0 || rowCount === 0) {
    return [];
  }

  const soleHolding = holdings.length === 1;
  const series = holdings.map((holding) => ({
    shares: holding.sharesPurchased,
    closes: getCloseSeries(history, holding.ticker, soleHolding),
  }));

  const start = Math.max(0, rowCount - points);
  const trend: TrendPoint[] = [];

  for (let row = start; row < rowCount; row++) {
    let value = 0;
    for (const { shares, closes } of series) {
      // A missing close contributes nothing for that day
      const close = closes?.[row] ?? null;
      if (close !== null) {
        value += shares * close;
      }
    }
    trend.push({ date: history.dates[row], portfolioValueUsd: roundCurrency(value) });
  }

  return trend;
}
