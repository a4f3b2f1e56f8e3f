/**
 * Strategy resolution
 *
 * Turns 1-2 strategy ids into an ordered, deduplicated, size-bounded ticker list.
 *
 * Two modes:
 * - static: every strategy uses its hand-curated basket
 * - screening: non-index strategies screen a candidate universe on fundamentals
 *
 * The index strategy always uses its basket, and its funds never pass a screen.
 */

import { PORTFOLIO_CONFIG } from './env';
import { INDEX_BASKET, getStrategy } from './strategies';
import type { Fundamentals, Instrument, StrategyId } from './types/portfolio';

/**
 * Debt-to-equity assumed when an instrument does not report one.
 * Above the quality screen's maxDebtToEquity (50), so a missing value fails the screen.
 */
export const MISSING_DEBT_TO_EQUITY = 100;

/**
 * Ticker returned when screening leaves nothing (screening mode only).
 * This is a product policy: callers always get a one-stock portfolio instead of an error.
 * Override with FALLBACK_TICKER in the environment or `fallbackTicker` per call.
 */
export const FALLBACK_TICKER = PORTFOLIO_CONFIG.FALLBACK_TICKER;

export interface ScreeningPolicy {
  excludedSectors: string[];
  // Whether an instrument without a sector passes the ethical screen
  allowMissingSector: boolean;
  minRevenueGrowth: number;
  minReturnOnEquity: number;
  maxDebtToEquity: number;
  missingDebtToEquity: number;
  maxTrailingPE: number;
}

export const DEFAULT_SCREENING_POLICY: ScreeningPolicy = {
  excludedSectors: ['Energy', 'Utilities', 'Basic Materials'],
  allowMissingSector: false,
  minRevenueGrowth: 0.15,
  minReturnOnEquity: 0.15,
  maxDebtToEquity: 50,
  missingDebtToEquity: MISSING_DEBT_TO_EQUITY,
  maxTrailingPE: 25,
};

export type ResolveOptions =
  | {
      mode: 'static';
      maxPortfolioSize?: number;
    }
  | {
      mode: 'screening';
      universe: Instrument[];
      policy?: Partial<ScreeningPolicy>;
      fallbackTicker?: string;
      maxPortfolioSize?: number;
    };

type Screen = (fundamentals: Fundamentals, policy: ScreeningPolicy) => boolean;

const SCREENS: Record<Exclude<StrategyId, 'index'>, Screen> = {
  ethical: ({ sector }, policy) => {
    if (sector === undefined || sector === '') {
      return policy.allowMissingSector;
    }
    return !policy.excludedSectors.includes(sector);
  },

  growth: ({ revenueGrowth }, policy) =>
    revenueGrowth !== undefined && revenueGrowth > policy.minRevenueGrowth,

  quality: ({ returnOnEquity, debtToEquity }, policy) => {
    const leverage = debtToEquity ?? policy.missingDebtToEquity;
    return (
      returnOnEquity !== undefined &&
      returnOnEquity > policy.minReturnOnEquity &&
      leverage < policy.maxDebtToEquity
    );
  },

  value: ({ trailingPE }, policy) =>
    trailingPE !== undefined && trailingPE > 0 && trailingPE < policy.maxTrailingPE,
};

/**
 * Check one instrument against one screening strategy
 */
export function passesScreen(
  strategy: Exclude<StrategyId, 'index'>,
  instrument: Instrument,
  policy: ScreeningPolicy = DEFAULT_SCREENING_POLICY
): boolean {
  if (!instrument.fundamentals || INDEX_BASKET.includes(instrument.ticker)) {
    return false;
  }
  return SCREENS[strategy](instrument.fundamentals, policy);
}

/**
 * Screen a universe for one strategy, keeping universe order
 */
export function screenUniverse(
  strategy: Exclude<StrategyId, 'index'>,
  universe: Instrument[],
  policy: ScreeningPolicy = DEFAULT_SCREENING_POLICY
): string[] {
  return universe
    .filter((instrument) => passesScreen(strategy, instrument, policy))
    .map((instrument) => instrument.ticker);
}

/**
 * Remove duplicates, keeping the first occurrence of each ticker
 */
export function dedupeTickers(tickers: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const ticker of tickers) {
    if (!seen.has(ticker)) {
      seen.add(ticker);
      unique.push(ticker);
    }
  }
  return unique;
}

export function resolveStrategies(strategies: StrategyId[], options: ResolveOptions): string[] {
  const maxSize = options.maxPortfolioSize ?? PORTFOLIO_CONFIG.MAX_PORTFOLIO_SIZE;
  const selected: string[] = [];

  for (const id of strategies) {
    const strategy = getStrategy(id);

    if (options.mode === 'static' || strategy.alwaysStatic || id === 'index') {
      selected.push(...strategy.basket);
      continue;
    }

    const policy = { ...DEFAULT_SCREENING_POLICY, ...options.policy };
    selected.push(...screenUniverse(id, options.universe, policy));
  }

  if (options.mode === 'screening' && selected.length === 0 && strategies.length > 0) {
    return [options.fallbackTicker ?? FALLBACK_TICKER];
  }

  return dedupeTickers(selected).slice(0, maxSize);
}
