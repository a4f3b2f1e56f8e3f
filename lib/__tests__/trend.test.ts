/**
 * Tests for portfolio valuation and the recent value trend
 */

import { EMPTY_HISTORY, ingestPriceHistory, type PriceHistory } from '../price-history';
import { reconstructTrend } from '../trend';
import { roundCurrency, valuePortfolio } from '../valuation';
import type { AllocationResult } from '../types/portfolio';

const allocation: AllocationResult = {
  holdings: [
    { ticker: 'A', allocatedUsd: 1000, sharesPurchased: 10 },
    { ticker: 'B', allocatedUsd: 500, sharesPurchased: 5 },
  ],
  leftoverCash: 0,
};

const weekOfHistory: PriceHistory = {
  shape: 'flat',
  dates: ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05', '2024-01-06', '2024-01-07'],
  closes: {
    A: [1, 2, 3, 4, 5, 6, 7],
    B: [10, 10, 10, 10, null, 10, 10],
  },
};

describe('valuePortfolio', () => {
  it('should value holdings at current prices', () => {
    expect(valuePortfolio(allocation, { A: 110, B: 190 })).toBe(2050);
  });

  it('should count holdings without a usable price as zero', () => {
    expect(valuePortfolio(allocation, { A: 110 })).toBe(1100);
    expect(valuePortfolio(allocation, { A: 110, B: 0 })).toBe(1100);
  });

  it('should round to cents', () => {
    expect(roundCurrency(12.345678)).toBe(12.35);
    expect(roundCurrency(10)).toBe(10);
  });
});

describe('reconstructTrend', () => {
  it('should value the allocation over the last five rows', () => {
    expect(reconstructTrend(allocation, weekOfHistory)).toEqual([
      { date: '2024-01-03', portfolioValueUsd: 80 },
      { date: '2024-01-04', portfolioValueUsd: 90 },
      // B has no close on this day
      { date: '2024-01-05', portfolioValueUsd: 50 },
      { date: '2024-01-06', portfolioValueUsd: 110 },
      { date: '2024-01-07', portfolioValueUsd: 120 },
    ]);
  });

  it('should return every row of a short history', () => {
    const history: PriceHistory = {
      shape: 'flat',
      dates: ['2024-01-01', '2024-01-02'],
      closes: { A: [1, 2], B: [10, 20] },
    };
    expect(reconstructTrend(allocation, history).map((p) => p.portfolioValueUsd)).toEqual([60, 120]);
  });

  it('should ignore holdings missing from the history', () => {
    const history: PriceHistory = { shape: 'flat', dates: ['2024-01-01'], closes: { A: [3] } };
    expect(reconstructTrend(allocation, history)).toEqual([{ date: '2024-01-01', portfolioValueUsd: 30 }]);
  });

  it('should apply an unlabelled single series to a sole holding', () => {
    const single: AllocationResult = {
      holdings: [{ ticker: 'A', allocatedUsd: 30, sharesPurchased: 3 }],
      leftoverCash: 0,
    };
    const history: PriceHistory = { shape: 'single', dates: ['2024-01-01'], closes: [10.5] };
    expect(reconstructTrend(single, history)).toEqual([{ date: '2024-01-01', portfolioValueUsd: 31.5 }]);
    expect(reconstructTrend(allocation, history)).toEqual([{ date: '2024-01-01', portfolioValueUsd: 0 }]);
  });

  it('should value a sole holding from its own column when Close is also present', () => {
    const single: AllocationResult = {
      holdings: [{ ticker: 'AAPL', allocatedUsd: 10, sharesPurchased: 1 }],
      leftoverCash: 0,
    };
    const history = ingestPriceHistory([{ Date: '2024-01-02', AAPL: '10', Close: '5' }]);
    expect(reconstructTrend(single, history)).toEqual([{ date: '2024-01-02', portfolioValueUsd: 10 }]);
  });

  it('should return an empty trend without history or holdings', () => {
    expect(reconstructTrend(allocation, EMPTY_HISTORY)).toEqual([]);
    expect(reconstructTrend({ holdings: [], leftoverCash: 100 }, weekOfHistory)).toEqual([]);
  });
});
