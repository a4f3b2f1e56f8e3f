/**
 * Strategy catalogue and candidate universe
 */

import { InvalidStrategyError } from './errors';
import type { Instrument, StrategyId } from './types/portfolio';

export interface StrategyDefinition {
  id: StrategyId;
  label: string;
  description: string;
  // Static strategies never screen, even when fundamentals are available
  alwaysStatic: boolean;
  basket: string[];
}

export const INDEX_BASKET = ['VOO', 'QQQ', 'VTI', 'BND', 'IVV', 'SPY'];

export const STRATEGIES: StrategyDefinition[] = [
  {
    id: 'ethical',
    label: 'Ethical Investing',
    description: 'Excludes energy, utilities and basic materials companies',
    alwaysStatic: false,
    basket: ['AAPL', 'MSFT', 'ADBE', 'CRM', 'COST'],
  },
  {
    id: 'growth',
    label: 'Growth Investing',
    description: 'Companies growing revenue faster than 15% a year',
    alwaysStatic: false,
    basket: ['NVDA', 'TSLA', 'AMD', 'SHOP', 'SNOW'],
  },
  {
    id: 'index',
    label: 'Index Investing',
    description: 'Broad-market index funds',
    alwaysStatic: true,
    basket: INDEX_BASKET,
  },
  {
    id: 'quality',
    label: 'Quality Investing',
    description: 'High return on equity with low leverage',
    alwaysStatic: false,
    basket: ['MA', 'V', 'GOOGL', 'META', 'ABBV'],
  },
  {
    id: 'value',
    label: 'Value Investing',
    description: 'Profitable companies trading below 25x earnings',
    alwaysStatic: false,
    basket: ['JPM', 'JNJ', 'PG', 'KO', 'BAC'],
  },
];

export const STRATEGY_IDS: StrategyId[] = STRATEGIES.map((s) => s.id);

/**
 * Tickers screened by non-index strategies. Index funds are listed so the
 * resolver can prove they are excluded from screening.
 */
export const CANDIDATE_TICKERS = [
  ...INDEX_BASKET,
  'NVDA', 'TSLA', 'AMD', 'SHOP', 'SNOW',
  'AAPL', 'MSFT', 'GOOGL', 'AMZN', 'META', 'JPM', 'JNJ',
  'V', 'PG', 'MA', 'HD', 'CVX', 'MRK', 'ABBV', 'PEP', 'KO', 'BAC', 'COST', 'ADBE', 'CRM',
];

export function getStrategy(id: StrategyId): StrategyDefinition {
  const strategy = STRATEGIES.find((s) => s.id === id);
  if (!strategy) {
    throw new InvalidStrategyError(id, STRATEGY_IDS);
  }
  return strategy;
}

/**
 * Look up a strategy from the wire.
 * Accepts the id ("growth") or the display label ("Growth Investing"), case-insensitive.
 */
export function findStrategyId(name: string): StrategyId | null {
  const normalized = name.trim().toLowerCase();
  const match = STRATEGIES.find(
    (s) => s.id === normalized || s.label.toLowerCase() === normalized
  );
  return match ? match.id : null;
}

export function parseStrategy(name: string): StrategyId {
  const id = findStrategyId(name);
  if (id === null) {
    throw new InvalidStrategyError(name, STRATEGY_IDS);
  }
  return id;
}

/**
 * Attach fundamentals to the candidate tickers. Tickers without an entry
 * stay in the universe with no fundamentals and fail every screen.
 */
export function buildUniverse(
  tickers: string[],
  fundamentals: Record<string, Instrument['fundamentals']>
): Instrument[] {
  return tickers.map((ticker) => ({ ticker, fundamentals: fundamentals[ticker] }));
}
