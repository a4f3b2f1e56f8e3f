/**
 * Tests for whole-share allocation and trend weighting
 */

import {
  allocate,
  equalWeights,
  isUsablePrice,
  movingAverage,
  trendWeights,
} from '../allocator';
import { EmptyTickerListError } from '../errors';
import { EMPTY_HISTORY, type PriceHistory } from '../price-history';

const FIVE_DAYS = ['2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05', '2024-01-08'];

function flatHistory(closes: Record<string, Array<number | null>>, dates = FIVE_DAYS): PriceHistory {
  return { shape: 'flat', dates, closes };
}

describe('Allocator', () => {
  describe('isUsablePrice', () => {
    it('should accept positive finite prices only', () => {
      expect(isUsablePrice(12.5)).toBe(true);
      expect(isUsablePrice(0)).toBe(false);
      expect(isUsablePrice(-3)).toBe(false);
      expect(isUsablePrice(Infinity)).toBe(false);
      expect(isUsablePrice(undefined)).toBe(false);
    });
  });

  describe('movingAverage', () => {
    it('should skip missing closes', () => {
      expect(movingAverage([null, 1, 2, 3, 4, 5])).toBe(3);
    });

    it('should return null with too few observations', () => {
      expect(movingAverage([1, 2, 3, 4])).toBeNull();
      expect(movingAverage([1, null, 2, null, 3, 4])).toBeNull();
    });

    it('should only look at the last rows of the window', () => {
      const closes = Array.from({ length: 25 }, (_, i) => i + 1);
      // last 20 values are 6..25
      expect(movingAverage(closes)).toBe(15.5);
    });
  });

  describe('equalWeights', () => {
    it('should split evenly', () => {
      expect(equalWeights(['A', 'B', 'C', 'D'])).toEqual({ A: 0.25, B: 0.25, C: 0.25, D: 0.25 });
    });

    it('should sum to one', () => {
      const weights = equalWeights(['A', 'B', 'C']);
      const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
      expect(total).toBeCloseTo(1, 10);
    });
  });

  describe('trendWeights', () => {
    it('should favour tickers trading above their average', () => {
      const history = flatHistory({ A: [100, 100, 100, 100, 100], B: [50, 50, 50, 50, 50] });
      const weights = trendWeights(['A', 'B'], { A: 200, B: 50 }, history);
      expect(weights.A).toBeCloseTo(0.8, 10);
      expect(weights.B).toBeCloseTo(0.2, 10);
    });

    it('should match equal weights when every price sits on its average', () => {
      const history = flatHistory({ A: [100, 100, 100, 100, 100], B: [50, 50, 50, 50, 50], C: [7, 7, 7, 7, 7] });
      const tickers = ['A', 'B', 'C'];
      expect(trendWeights(tickers, { A: 100, B: 50, C: 7 }, history)).toEqual(equalWeights(tickers));
    });

    it('should keep the baseline score when history is too short', () => {
      const history = flatHistory(
        { A: [100, 100, 100, 100], B: [50, 50, 50, 50] },
        FIVE_DAYS.slice(0, 4)
      );
      expect(trendWeights(['A', 'B'], { A: 200, B: 50 }, history)).toEqual({ A: 0.5, B: 0.5 });
    });

    it('should keep the baseline score for a ticker without a price or history', () => {
      const history = flatHistory({ A: [100, 100, 100, 100, 100] });
      const weights = trendWeights(['A', 'B', 'C'], { A: 200, C: 10 }, history);
      // A scores 4, B and C score 1
      expect(weights.A).toBeCloseTo(4 / 6, 10);
      expect(weights.B).toBeCloseTo(1 / 6, 10);
      expect(weights.C).toBeCloseTo(1 / 6, 10);
    });

    it('should use an unlabelled single series only for a sole ticker', () => {
      const history: PriceHistory = { shape: 'single', dates: FIVE_DAYS, closes: [10, 10, 10, 10, 10] };
      expect(trendWeights(['A'], { A: 30 }, history)).toEqual({ A: 1 });
      expect(trendWeights(['A', 'B'], { A: 30, B: 10 }, history)).toEqual({ A: 0.5, B: 0.5 });
    });
  });

  describe('allocate', () => {
    it('should split equally and floor to whole shares', () => {
      const result = allocate(10000, ['A', 'B'], { A: 100, B: 200 });

      expect(result.holdings).toEqual([
        { ticker: 'A', allocatedUsd: 5000, sharesPurchased: 50, weightPct: 50 },
        { ticker: 'B', allocatedUsd: 5000, sharesPurchased: 25, weightPct: 50 },
      ]);
      expect(result.leftoverCash).toBe(0);
    });

    it('should omit a ticker too expensive for a single share', () => {
      const result = allocate(10000, ['A', 'B'], { A: 100, B: 999999 });

      expect(result.holdings).toEqual([
        { ticker: 'A', allocatedUsd: 5000, sharesPurchased: 50, weightPct: 50 },
      ]);
      expect(result.leftoverCash).toBe(5000);
    });

    it('should keep the remainder of each floor as leftover cash', () => {
      const result = allocate(10000, ['A', 'B', 'C'], { A: 30, B: 70, C: 110 });

      expect(result.holdings.map((h) => [h.ticker, h.sharesPurchased, h.allocatedUsd])).toEqual([
        ['A', 111, 3330],
        ['B', 47, 3290],
        ['C', 30, 3300],
      ]);
      expect(result.holdings[0].weightPct).toBe(33.33);
      expect(result.leftoverCash).toBe(80);
    });

    it('should skip tickers without a price', () => {
      const result = allocate(10000, ['A', 'B'], { A: 100 });

      expect(result.holdings.map((h) => h.ticker)).toEqual(['A']);
      expect(result.leftoverCash).toBe(5000);
    });

    it('should never hold tickers with a non-positive price', () => {
      const result = allocate(10000, ['A', 'B', 'C'], { A: 0, B: -5, C: 100 });

      expect(result.holdings.map((h) => h.ticker)).toEqual(['C']);
      expect(result.holdings[0].sharesPurchased).toBe(33);
      expect(result.leftoverCash).toBe(6700);
    });

    it('should collapse duplicate tickers', () => {
      const result = allocate(10000, ['A', 'A', 'B'], { A: 100, B: 200 });

      expect(result.holdings.map((h) => h.sharesPurchased)).toEqual([50, 25]);
      expect(result.leftoverCash).toBe(0);
    });

    it('should throw on an empty ticker list', () => {
      expect(() => allocate(10000, [], {})).toThrow(EmptyTickerListError);
      expect(() => allocate(10000, [], {})).toThrow('Tickers list cannot be empty');
    });

    it('should use trend weights when history is given', () => {
      const history = flatHistory({ A: [100, 100, 100, 100, 100], B: [50, 50, 50, 50, 50] });
      const result = allocate(10000, ['A', 'B'], { A: 200, B: 50 }, history);

      expect(result.holdings).toEqual([
        { ticker: 'A', allocatedUsd: 8000, sharesPurchased: 40, weightPct: 80 },
        { ticker: 'B', allocatedUsd: 2000, sharesPurchased: 40, weightPct: 20 },
      ]);
      expect(result.leftoverCash).toBe(0);
    });

    it('should fall back to equal weights for an empty history', () => {
      const result = allocate(10000, ['A', 'B'], { A: 200, B: 50 }, EMPTY_HISTORY);

      expect(result.holdings.map((h) => h.sharesPurchased)).toEqual([25, 100]);
    });
  });
});
