/**
 * Portfolio Suggestion Types
 *
 * Shared shapes for strategies, instruments, allocations and trend points
 */

export type StrategyId = 'ethical' | 'growth' | 'index' | 'quality' | 'value';

export type WeightingMode = 'equal' | 'trend';

export interface Fundamentals {
  sector?: string;
  revenueGrowth?: number;   // 0.15 = 15%
  returnOnEquity?: number;  // 0.15 = 15%
  debtToEquity?: number;    // Percent, e.g. 45.2
  trailingPE?: number;
}

export interface Instrument {
  ticker: string;
  fundamentals?: Fundamentals;
}

// ticker -> live price
export type PriceQuote = Record<string, number>;

export interface Holding {
  ticker: string;
  allocatedUsd: number;
  sharesPurchased: number;
  weightPct?: number;
}

export interface AllocationResult {
  holdings: Holding[];
  leftoverCash: number;
}

export interface TrendPoint {
  date: string; // YYYY-MM-DD
  portfolioValueUsd: number;
}

export interface SuggestionRequest {
  investmentAmount: number;
  strategies: StrategyId[];
  weighting?: WeightingMode;
}

export interface PortfolioSuggestion {
  strategies: StrategyId[];
  tickers: string[];
  weighting: WeightingMode;
  suggestedHoldings: Holding[];
  currentTotalValueUsd: number;
  weeklyValueTrend: TrendPoint[];
  leftoverCashUsd: number;
}
